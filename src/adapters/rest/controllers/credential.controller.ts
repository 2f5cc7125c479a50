import {
  Body,
  Controller,
  Get,
  HttpCode,
  Logger,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { CredentialStoreService } from '@core/credential-store.service';
import { Credential, isExpired, isUsable } from '@core/entities/credential.entity';
import { LedgerService } from '@core/ledger.service';
import { Caller } from '../decorators/caller.decorator';
import { RequireSignature } from '../decorators/require-signature.decorator';
import { IssueCredentialDto, ListCredentialsQueryDto } from '../dto';

export interface CredentialView extends Credential {
  expired: boolean;
  usable: boolean;
}

/**
 * REST API controller for credential issuance, lookup and revocation
 */
@Controller('credentials')
export class CredentialController {
  private readonly logger = new Logger(CredentialController.name);

  constructor(
    private readonly credentialStore: CredentialStoreService,
    private readonly ledger: LedgerService,
  ) {}

  /**
   * Issue a credential (authorized verifiers only)
   * POST /api/v1/credentials
   * Body: { subject, credentialType, data, expiresInSeconds }
   */
  @Post()
  @RequireSignature()
  async issueCredential(@Caller() caller: string, @Body() body: IssueCredentialDto) {
    this.logger.log(`📜 Issuance request by ${caller} for ${body.subject} (${body.credentialType})`);
    const credential = await this.credentialStore.issueCredential(
      caller,
      body.subject,
      body.credentialType,
      body.data,
      body.expiresInSeconds,
    );
    return {
      credentialId: credential.id,
      credential: this.toView(credential),
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * GET /api/v1/credentials?subject=0x...&issuer=0x...
   */
  @Get()
  async listCredentials(@Query() query: ListCredentialsQueryDto) {
    const credentials = await this.credentialStore.listCredentials({
      subject: query.subject,
      issuer: query.issuer,
    });
    return {
      credentials: credentials.map((credential) => this.toView(credential)),
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * GET /api/v1/credentials/count
   */
  @Get('count')
  async getTotalCredentials() {
    return {
      total: await this.credentialStore.getTotalCredentials(),
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * GET /api/v1/credentials/:id
   * `credential` is null for an unknown id
   */
  @Get(':id')
  async getCredential(@Param('id', ParseIntPipe) id: number) {
    const credential = await this.credentialStore.getCredential(id);
    return {
      id,
      exists: credential !== null,
      credential: credential ? this.toView(credential) : null,
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * Revoke a credential (its issuer only)
   * POST /api/v1/credentials/:id/revoke
   */
  @Post(':id/revoke')
  @HttpCode(200)
  @RequireSignature()
  async revokeCredential(@Caller() caller: string, @Param('id', ParseIntPipe) id: number) {
    this.logger.log(`🚫 Revocation request for credential #${id} by ${caller}`);
    const credential = await this.credentialStore.revokeCredential(caller, id);
    return {
      credential: this.toView(credential),
      timestamp: new Date().toISOString(),
    };
  }

  private toView(credential: Credential): CredentialView {
    const now = this.ledger.now();
    return {
      ...credential,
      expired: isExpired(credential, now),
      usable: isUsable(credential, now),
    };
  }
}
