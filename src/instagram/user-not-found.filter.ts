import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { UserNotFoundException } from './user-not-found.exception';

@Catch(UserNotFoundException)
export class UserNotFoundFilter implements ExceptionFilter<UserNotFoundException> {
  constructor(private readonly adapterHost: HttpAdapterHost) {}

  catch(exception: UserNotFoundException, host: ArgumentsHost): void {
    const { httpAdapter } = this.adapterHost;
    const response: unknown = host.switchToHttp().getResponse();

    httpAdapter.reply(response, { detail: exception.message }, HttpStatus.BAD_REQUEST);
  }
}
