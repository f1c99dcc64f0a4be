import { Transform, TransformFnParams } from 'class-transformer';
import { IsEnum, IsInt, IsOptional, IsString, Matches, Min } from 'class-validator';
import { MediaType } from '../instagram.constants';

export const USERNAME_PATTERN = /^[A-Za-z0-9._]{1,30}$/;

const DIGITS = /^\d+$/;

/**
 * Converts a plain run of digits to a number. Anything else (blank, `1e1`,
 * `0x10`) is passed through untouched so `IsInt` rejects it.
 */
export function toCount({ value }: TransformFnParams): unknown {
  if (typeof value === 'string' && DIGITS.test(value.trim())) {
    return Number(value.trim());
  }
  return value;
}

export class GetMediaQuery {
  @IsString()
  @Matches(USERNAME_PATTERN, { message: 'username must be a valid Instagram username' })
  username!: string;

  @Transform(toCount)
  @IsInt()
  @Min(0)
  max_count!: number;
}

export class GetPostsQuery {
  @IsString()
  @Matches(USERNAME_PATTERN, { message: 'username must be a valid Instagram username' })
  username!: string;

  @IsOptional()
  @Transform(toCount)
  @IsInt()
  @Min(0)
  max_count?: number;

  @IsOptional()
  @IsEnum(MediaType)
  type?: MediaType;
}
