import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import { RoleRegistryService } from '@core/role-registry.service';
import { Caller } from '../decorators/caller.decorator';
import { RequireSignature } from '../decorators/require-signature.decorator';
import { AuthorizeVerifierDto } from '../dto';

/**
 * Controller for verifier authorization
 */
@Controller('verifiers')
export class VerifierController {
  constructor(private readonly roleRegistry: RoleRegistryService) {}

  /**
   * Authorize a verifier (admin only)
   * POST /api/v1/verifiers
   * Body: { address: string }
   */
  @Post()
  @RequireSignature()
  async authorizeVerifier(@Caller() caller: string, @Body() body: AuthorizeVerifierDto) {
    const authorization = await this.roleRegistry.authorizeVerifier(caller, body.address);
    return {
      ...authorization,
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * GET /api/v1/verifiers
   */
  @Get()
  async listVerifiers() {
    return {
      admin: await this.roleRegistry.getAdmin(),
      verifiers: await this.roleRegistry.listVerifiers(),
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * GET /api/v1/verifiers/:address
   */
  @Get(':address')
  async isAuthorizedVerifier(@Param('address') address: string) {
    return {
      address,
      authorized: await this.roleRegistry.isAuthorizedVerifier(address),
      timestamp: new Date().toISOString(),
    };
  }
}
