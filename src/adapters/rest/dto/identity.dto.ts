import { IsInt, IsOptional, IsString, MaxLength, Min } from 'class-validator';

export class CreateIdentityDto {
  @IsString()
  @MaxLength(256)
  name!: string;

  @IsString()
  @MaxLength(320)
  email!: string;
}

export class VerifyIdentityDto {
  /** Omit or send 0 for general verification */
  @IsOptional()
  @IsInt()
  @Min(0)
  credentialId?: number;
}
