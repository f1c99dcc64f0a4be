import { ConfigModule } from '@nestjs/config';
import { validateEnvironment } from './env.validation';

export function appConfigModule(): ReturnType<typeof ConfigModule.forRoot> {
  return ConfigModule.forRoot({
    isGlobal: true,
    envFilePath: '.env',
    validate: validateEnvironment,
  });
}
