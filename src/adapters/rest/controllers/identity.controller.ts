import { Body, Controller, Get, HttpCode, Logger, Param, Post } from '@nestjs/common';
import { IdentityStoreService } from '@core/identity-store.service';
import { VerificationEngineService } from '@core/verification-engine.service';
import { Caller } from '../decorators/caller.decorator';
import { RequireSignature } from '../decorators/require-signature.decorator';
import { CreateIdentityDto, VerifyIdentityDto } from '../dto';

/**
 * REST API controller for identities and their verification
 */
@Controller('identities')
export class IdentityController {
  private readonly logger = new Logger(IdentityController.name);

  constructor(
    private readonly identityStore: IdentityStoreService,
    private readonly verificationEngine: VerificationEngineService,
  ) {}

  /**
   * Register the caller's identity
   * POST /api/v1/identities
   * Body: { name: string, email: string }
   */
  @Post()
  @RequireSignature()
  async createIdentity(@Caller() caller: string, @Body() body: CreateIdentityDto) {
    this.logger.log(`🆔 Identity registration request from ${caller}`);
    const identity = await this.identityStore.createIdentity(caller, body.name, body.email);
    return {
      identity,
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * GET /api/v1/identities/:address
   * `identity` is null when the address has not registered
   */
  @Get(':address')
  async getIdentity(@Param('address') address: string) {
    const identity = await this.identityStore.getIdentity(address);
    return {
      address,
      exists: identity !== null,
      identity,
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * Verify an identity, or one of its credentials when credentialId is given
   * POST /api/v1/identities/:address/verify
   * Body: { credentialId?: number }
   */
  @Post(':address/verify')
  @HttpCode(200)
  @RequireSignature()
  async verifyIdentity(
    @Caller() caller: string,
    @Param('address') address: string,
    @Body() body: VerifyIdentityDto,
  ) {
    this.logger.log(
      `🔐 Verification request for ${address} by ${caller}` +
        (body.credentialId ? ` (credential #${body.credentialId})` : ''),
    );
    const outcome = await this.verificationEngine.verifyIdentity(caller, address, body.credentialId);
    return {
      ...outcome,
      timestamp: new Date().toISOString(),
    };
  }
}
