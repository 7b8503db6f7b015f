import { Module } from '@nestjs/common';
import { TenantContextService } from './tenant-context.service';
import { TenantsRepository } from './tenants.repository';

@Module({
  providers: [TenantsRepository, TenantContextService],
  exports: [TenantContextService],
})
export class TenantsModule {}
