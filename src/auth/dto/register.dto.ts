import { IsEmail, IsOptional, IsString, Length, Matches, MaxLength } from 'class-validator';
import { Transform } from 'class-transformer';

const trim = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);

export class RegisterDto {
  @Transform(trim)
  @IsEmail()
  @MaxLength(255)
  email!: string;

  @Transform(trim)
  @IsString()
  @Length(3, 50)
  @Matches(/^[A-Za-z0-9_.-]+$/, {
    message: 'username may only contain letters, digits, dots, dashes and underscores',
  })
  username!: string;

  /** Strength is checked by the password policy in AuthService. */
  @IsString()
  password!: string;

  @IsOptional()
  @Transform(trim)
  @IsString()
  @MaxLength(255)
  full_name?: string;
}
