import { IsEthereumAddress } from 'class-validator';

export class AuthorizeVerifierDto {
  @IsEthereumAddress()
  address!: string;
}
