import { Injectable } from '@nestjs/common';
import { STAFF_ROLES } from '@shared/order';
import { DatabaseService } from '../database/database.service';

@Injectable()
export class StaffDevicesRepository {
  constructor(private readonly db: DatabaseService) {}

  /** Distinct push tokens of the tenant's active staff members. */
  async findStaffPushTokens(tenantId: string): Promise<string[]> {
    const { rows } = await this.db.query<{ push_token: string }>(
      `SELECT DISTINCT p.push_token
         FROM tenant_memberships m
         JOIN profiles p ON p.id = m.user_id
        WHERE m.tenant_id = $1
          AND m.is_active = true
          AND m.role = ANY($2::text[])
          AND p.push_token IS NOT NULL
          AND p.push_token <> ''`,
      [tenantId, [...STAFF_ROLES]],
    );
    return rows.map((row) => row.push_token);
  }
}
