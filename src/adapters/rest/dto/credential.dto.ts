import { IsEthereumAddress, IsInt, IsOptional, IsString, MaxLength, Min } from 'class-validator';

export class IssueCredentialDto {
  @IsEthereumAddress()
  subject!: string;

  @IsString()
  @MaxLength(128)
  credentialType!: string;

  /** Reference to the off-ledger payload, e.g. ipfs://<cid> */
  @IsString()
  @MaxLength(2048)
  data!: string;

  @IsInt()
  @Min(0)
  expiresInSeconds!: number;
}

export class ListCredentialsQueryDto {
  @IsOptional()
  @IsEthereumAddress()
  subject?: string;

  @IsOptional()
  @IsEthereumAddress()
  issuer?: string;
}
