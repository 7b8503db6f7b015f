import { Injectable } from '@nestjs/common';
import type { MemberRole } from '@shared/order';
import { DatabaseService } from '../database/database.service';

export type TenantRecord = {
  id: string;
  name: string;
  isActive: boolean;
};

export type ProfileRecord = {
  id: string;
  currentTenantId: string | null;
  legacyRole: string | null;
};

export type MembershipRecord = {
  tenantId: string;
  userId: string;
  role: MemberRole;
  isActive: boolean;
  acceptedAt: Date;
};

type MembershipRow = {
  tenant_id: string;
  user_id: string;
  role: MemberRole;
  is_active: boolean;
  accepted_at: Date;
};

const MEMBERSHIP_COLUMNS = 'tenant_id, user_id, role, is_active, accepted_at';

const toMembership = (row: MembershipRow): MembershipRecord => ({
  tenantId: row.tenant_id,
  userId: row.user_id,
  role: row.role,
  isActive: row.is_active,
  acceptedAt: row.accepted_at,
});

@Injectable()
export class TenantsRepository {
  constructor(private readonly db: DatabaseService) {}

  async findProfile(userId: string): Promise<ProfileRecord | null> {
    const { rows } = await this.db.query<{
      id: string;
      current_tenant_id: string | null;
      legacy_role: string | null;
    }>(
      'SELECT id, current_tenant_id, legacy_role FROM profiles WHERE id = $1',
      [userId],
    );
    const row = rows[0];
    return row
      ? {
          id: row.id,
          currentTenantId: row.current_tenant_id,
          legacyRole: row.legacy_role,
        }
      : null;
  }

  async findTenant(tenantId: string): Promise<TenantRecord | null> {
    const { rows } = await this.db.query<{
      id: string;
      name: string;
      is_active: boolean;
    }>('SELECT id, name, is_active FROM tenants WHERE id = $1', [tenantId]);
    const row = rows[0];
    return row ? { id: row.id, name: row.name, isActive: row.is_active } : null;
  }

  async findMembership(
    tenantId: string,
    userId: string,
  ): Promise<MembershipRecord | null> {
    const { rows } = await this.db.query<MembershipRow>(
      `SELECT ${MEMBERSHIP_COLUMNS} FROM tenant_memberships
        WHERE tenant_id = $1 AND user_id = $2`,
      [tenantId, userId],
    );
    return rows[0] ? toMembership(rows[0]) : null;
  }

  async findFirstActiveMembership(
    userId: string,
  ): Promise<MembershipRecord | null> {
    const { rows } = await this.db.query<MembershipRow>(
      `SELECT ${MEMBERSHIP_COLUMNS} FROM tenant_memberships
        WHERE user_id = $1 AND is_active = true
        ORDER BY accepted_at ASC
        LIMIT 1`,
      [userId],
    );
    return rows[0] ? toMembership(rows[0]) : null;
  }

  /**
   * Inserts an active membership. A concurrent insert for the same pair
   * wins; the stored row is returned either way.
   */
  async createMembership(input: {
    tenantId: string;
    userId: string;
    role: MemberRole;
  }): Promise<MembershipRecord> {
    const { rows } = await this.db.query<MembershipRow>(
      `INSERT INTO tenant_memberships (tenant_id, user_id, role, is_active, accepted_at)
       VALUES ($1, $2, $3, true, now())
       ON CONFLICT (tenant_id, user_id) DO NOTHING
       RETURNING ${MEMBERSHIP_COLUMNS}`,
      [input.tenantId, input.userId, input.role],
    );
    if (rows[0]) return toMembership(rows[0]);

    const existing = await this.findMembership(input.tenantId, input.userId);
    if (!existing) {
      throw new Error(
        `membership for user ${input.userId} in tenant ${input.tenantId} vanished after conflict`,
      );
    }
    return existing;
  }
}
