import { QueryResult, QueryResultRow } from 'pg';
import {
  AuditEntryId,
  DeclarationId,
  isAuditAction,
  isAuditEntityType,
  isMedicineStatus,
  isPropositionStatus,
  isUserRole,
  MedicineStatus,
  PharmacyId,
  PropositionId,
  PropositionStatus,
  UserId,
} from '../domain-types';
import { MedicineDeclaration } from '../domain/declaration/declaration-types';
import { MedicineProposition } from '../domain/proposition/proposition-logic';
import {
  AuditFilter,
  AuditLogEntry,
  DeclarationFilter,
  PharmacyRecord,
  PropositionFilter,
  PropositionListing,
  UserRecord,
  WorkflowStore,
  WorkflowTx,
} from './workflow-store';

// The slice of pg's Pool and PoolClient the store uses.
export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface SqlPoolClient extends SqlClient {
  release(): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
}

const SAVEPOINT_NAME_REGEX = /^[a-z_]+$/;

// === ROW SHAPES ===
type UserRow = {
  user_id: string;
  username: string;
  email: string;
  role: string;
  is_active: boolean;
};

type PharmacyRow = {
  pharmacy_id: string;
  name: string;
  address: string;
  city: string;
};

type DeclarationRow = {
  declaration_id: string;
  declaration_code: string;
  name: string;
  authorization_code: string;
  batch_number: string;
  expiration_date: Date;
  quantity: number;
  is_imported: boolean;
  country_of_origin: string | null;
  is_recalled: boolean;
  safety_rating: number;
  status: string;
  citizen_id: string;
  pharmacy_id: string | null;
  pharmacy_verified_at: Date | null;
  pharmacy_verified_by: string | null;
  pharmacy_notes: string | null;
  regulatory_validated_at: Date | null;
  regulatory_validated_by: string | null;
  regulatory_notes: string | null;
  cancelled_at: Date | null;
  created_at: Date;
  updated_at: Date;
};

type PropositionRow = {
  proposition_id: string;
  proposition_declaration_id: string;
  proposition_status: string;
  is_active: boolean;
  expired_at: Date | null;
  requesting_facility_id: string | null;
  requested_at: Date | null;
  proposition_created_at: Date;
  proposition_updated_at: Date;
};

type JoinedPharmacyRow = {
  pharmacy_ref_id: string | null;
  pharmacy_name: string | null;
  pharmacy_address: string | null;
  pharmacy_city: string | null;
};

type ListingRow = PropositionRow & DeclarationRow & JoinedPharmacyRow;

type AuditRow = {
  audit_entry_id: string;
  actor_id: string;
  action: string;
  entity_type: string;
  entity_id: string | null;
  details: Record<string, unknown> | null;
  created_at: Date;
};

const DECLARATION_COLUMNS = `
  d.declaration_id, d.declaration_code, d.name, d.authorization_code, d.batch_number,
  d.expiration_date, d.quantity, d.is_imported, d.country_of_origin, d.is_recalled,
  d.safety_rating, d.status, d.citizen_id, d.pharmacy_id,
  d.pharmacy_verified_at, d.pharmacy_verified_by, d.pharmacy_notes,
  d.regulatory_validated_at, d.regulatory_validated_by, d.regulatory_notes,
  d.cancelled_at, d.created_at, d.updated_at`;

const PROPOSITION_COLUMNS = `
  p.proposition_id, p.declaration_id AS proposition_declaration_id, p.status AS proposition_status,
  p.is_active, p.expired_at, p.requesting_facility_id, p.requested_at,
  p.created_at AS proposition_created_at, p.updated_at AS proposition_updated_at`;

const PHARMACY_COLUMNS = `
  ph.pharmacy_id AS pharmacy_ref_id, ph.name AS pharmacy_name,
  ph.address AS pharmacy_address, ph.city AS pharmacy_city`;

// === ROW MAPPERS ===
function toUser(row: UserRow): UserRecord {
  if (!isUserRole(row.role)) {
    throw new Error(`UNKNOWN_USER_ROLE:${row.role}`);
  }
  return {
    userId: row.user_id as UserId,
    username: row.username,
    email: row.email,
    role: row.role,
    isActive: row.is_active,
  };
}

function toPharmacy(row: PharmacyRow): PharmacyRecord {
  return {
    pharmacyId: row.pharmacy_id as PharmacyId,
    name: row.name,
    address: row.address,
    city: row.city,
  };
}

export function toDeclaration(row: DeclarationRow): MedicineDeclaration {
  if (!isMedicineStatus(row.status)) {
    throw new Error(`UNKNOWN_MEDICINE_STATUS:${row.status}`);
  }
  return {
    declarationId: row.declaration_id as DeclarationId,
    declarationCode: row.declaration_code,
    name: row.name,
    authorizationCode: row.authorization_code,
    batchNumber: row.batch_number,
    expirationDate: new Date(row.expiration_date),
    quantity: row.quantity,
    isImported: row.is_imported,
    countryOfOrigin: row.country_of_origin,
    isRecalled: row.is_recalled,
    safetyRating: row.safety_rating,
    status: row.status,
    citizenId: row.citizen_id as UserId,
    pharmacyId: row.pharmacy_id === null ? null : (row.pharmacy_id as PharmacyId),
    pharmacyVerifiedAt: row.pharmacy_verified_at === null ? null : new Date(row.pharmacy_verified_at),
    pharmacyVerifiedBy: row.pharmacy_verified_by === null ? null : (row.pharmacy_verified_by as UserId),
    pharmacyNotes: row.pharmacy_notes,
    regulatoryValidatedAt: row.regulatory_validated_at === null ? null : new Date(row.regulatory_validated_at),
    regulatoryValidatedBy: row.regulatory_validated_by === null ? null : (row.regulatory_validated_by as UserId),
    regulatoryNotes: row.regulatory_notes,
    cancelledAt: row.cancelled_at === null ? null : new Date(row.cancelled_at),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function toProposition(row: PropositionRow): MedicineProposition {
  if (!isPropositionStatus(row.proposition_status)) {
    throw new Error(`UNKNOWN_PROPOSITION_STATUS:${row.proposition_status}`);
  }
  return {
    propositionId: row.proposition_id as PropositionId,
    declarationId: row.proposition_declaration_id as DeclarationId,
    status: row.proposition_status,
    isActive: row.is_active,
    expiredAt: row.expired_at === null ? null : new Date(row.expired_at),
    requestingFacilityId: row.requesting_facility_id === null ? null : (row.requesting_facility_id as UserId),
    requestedAt: row.requested_at === null ? null : new Date(row.requested_at),
    createdAt: new Date(row.proposition_created_at),
    updatedAt: new Date(row.proposition_updated_at),
  };
}

function toListing(row: ListingRow): PropositionListing {
  const pharmacy =
    row.pharmacy_ref_id === null
      ? null
      : {
          pharmacyId: row.pharmacy_ref_id as PharmacyId,
          name: row.pharmacy_name ?? '',
          address: row.pharmacy_address ?? '',
          city: row.pharmacy_city ?? '',
        };
  return {
    proposition: toProposition(row),
    declaration: toDeclaration(row),
    pharmacy,
  };
}

function toAuditEntry(row: AuditRow): AuditLogEntry {
  if (!isAuditAction(row.action)) {
    throw new Error(`UNKNOWN_AUDIT_ACTION:${row.action}`);
  }
  if (!isAuditEntityType(row.entity_type)) {
    throw new Error(`UNKNOWN_AUDIT_ENTITY_TYPE:${row.entity_type}`);
  }
  return {
    auditEntryId: row.audit_entry_id as AuditEntryId,
    actorId: row.actor_id as UserId,
    action: row.action,
    entityType: row.entity_type,
    entityId: row.entity_id,
    details: row.details ?? {},
    createdAt: new Date(row.created_at),
  };
}

// === SHARED READS ===
async function selectUser(db: SqlClient, userId: UserId): Promise<UserRecord | null> {
  const result = await db.query<UserRow>(
    'SELECT user_id, username, email, role, is_active FROM users WHERE user_id = $1',
    [userId]
  );
  return result.rows.length === 0 ? null : toUser(result.rows[0]);
}

// === TRANSACTION ===
export class PgWorkflowTx implements WorkflowTx {
  constructor(private client: SqlClient) {}

  findUser(userId: UserId): Promise<UserRecord | null> {
    return selectUser(this.client, userId);
  }

  async findPharmacy(pharmacyId: PharmacyId): Promise<PharmacyRecord | null> {
    const result = await this.client.query<PharmacyRow>(
      'SELECT pharmacy_id, name, address, city FROM pharmacies WHERE pharmacy_id = $1',
      [pharmacyId]
    );
    return result.rows.length === 0 ? null : toPharmacy(result.rows[0]);
  }

  async lockDeclaration(declarationId: DeclarationId): Promise<MedicineDeclaration | null> {
    const result = await this.client.query<DeclarationRow>(
      `SELECT ${DECLARATION_COLUMNS}
       FROM medicine_declarations d
       WHERE d.declaration_id = $1
       FOR UPDATE`,
      [declarationId]
    );
    return result.rows.length === 0 ? null : toDeclaration(result.rows[0]);
  }

  async insertDeclaration(declaration: MedicineDeclaration): Promise<void> {
    await this.client.query(
      `INSERT INTO medicine_declarations (
        declaration_id, declaration_code, name, authorization_code, batch_number,
        expiration_date, quantity, is_imported, country_of_origin, is_recalled,
        safety_rating, status, citizen_id, pharmacy_id,
        pharmacy_verified_at, pharmacy_verified_by, pharmacy_notes,
        regulatory_validated_at, regulatory_validated_by, regulatory_notes,
        cancelled_at, created_at, updated_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19, $20, $21, $22, $23)`,
      [
        declaration.declarationId,
        declaration.declarationCode,
        declaration.name,
        declaration.authorizationCode,
        declaration.batchNumber,
        declaration.expirationDate,
        declaration.quantity,
        declaration.isImported,
        declaration.countryOfOrigin,
        declaration.isRecalled,
        declaration.safetyRating,
        declaration.status,
        declaration.citizenId,
        declaration.pharmacyId,
        declaration.pharmacyVerifiedAt,
        declaration.pharmacyVerifiedBy,
        declaration.pharmacyNotes,
        declaration.regulatoryValidatedAt,
        declaration.regulatoryValidatedBy,
        declaration.regulatoryNotes,
        declaration.cancelledAt,
        declaration.createdAt,
        declaration.updatedAt,
      ]
    );
  }

  async updateDeclaration(declaration: MedicineDeclaration, expectedStatus: MedicineStatus): Promise<boolean> {
    const result = await this.client.query(
      `UPDATE medicine_declarations SET
        status = $3,
        is_recalled = $4,
        safety_rating = $5,
        pharmacy_verified_at = $6,
        pharmacy_verified_by = $7,
        pharmacy_notes = $8,
        regulatory_validated_at = $9,
        regulatory_validated_by = $10,
        regulatory_notes = $11,
        cancelled_at = $12,
        updated_at = $13
      WHERE declaration_id = $1 AND status = $2`,
      [
        declaration.declarationId,
        expectedStatus,
        declaration.status,
        declaration.isRecalled,
        declaration.safetyRating,
        declaration.pharmacyVerifiedAt,
        declaration.pharmacyVerifiedBy,
        declaration.pharmacyNotes,
        declaration.regulatoryValidatedAt,
        declaration.regulatoryValidatedBy,
        declaration.regulatoryNotes,
        declaration.cancelledAt,
        declaration.updatedAt,
      ]
    );
    return (result.rowCount ?? 0) === 1;
  }

  async lockProposition(propositionId: PropositionId): Promise<MedicineProposition | null> {
    const result = await this.client.query<PropositionRow>(
      `SELECT ${PROPOSITION_COLUMNS}
       FROM medicine_propositions p
       WHERE p.proposition_id = $1
       FOR UPDATE`,
      [propositionId]
    );
    return result.rows.length === 0 ? null : toProposition(result.rows[0]);
  }

  async insertProposition(proposition: MedicineProposition): Promise<void> {
    await this.client.query(
      `INSERT INTO medicine_propositions (
        proposition_id, declaration_id, status, is_active, expired_at,
        requesting_facility_id, requested_at, created_at, updated_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
      [
        proposition.propositionId,
        proposition.declarationId,
        proposition.status,
        proposition.isActive,
        proposition.expiredAt,
        proposition.requestingFacilityId,
        proposition.requestedAt,
        proposition.createdAt,
        proposition.updatedAt,
      ]
    );
  }

  async updateProposition(proposition: MedicineProposition, expectedStatus: PropositionStatus): Promise<boolean> {
    const result = await this.client.query(
      `UPDATE medicine_propositions SET
        status = $3,
        is_active = $4,
        expired_at = $5,
        requesting_facility_id = $6,
        requested_at = $7,
        updated_at = $8
      WHERE proposition_id = $1 AND status = $2`,
      [
        proposition.propositionId,
        expectedStatus,
        proposition.status,
        proposition.isActive,
        proposition.expiredAt,
        proposition.requestingFacilityId,
        proposition.requestedAt,
        proposition.updatedAt,
      ]
    );
    return (result.rowCount ?? 0) === 1;
  }

  async lockExpirablePropositions(now: Date): Promise<MedicineProposition[]> {
    const result = await this.client.query<PropositionRow>(
      `SELECT ${PROPOSITION_COLUMNS}
       FROM medicine_propositions p
       JOIN medicine_declarations d ON d.declaration_id = p.declaration_id
       WHERE p.status = 'AVAILABLE'
         AND p.is_active = TRUE
         AND d.expiration_date < $1
       ORDER BY d.expiration_date ASC, p.proposition_id ASC
       FOR UPDATE OF p`,
      [now]
    );
    return result.rows.map(toProposition);
  }

  async insertAuditEntry(entry: AuditLogEntry): Promise<void> {
    await this.client.query(
      `INSERT INTO audit_log (
        audit_entry_id, actor_id, action, entity_type, entity_id, details, created_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        entry.auditEntryId,
        entry.actorId,
        entry.action,
        entry.entityType,
        entry.entityId,
        JSON.stringify(entry.details),
        entry.createdAt,
      ]
    );
  }

  async savepoint<T>(name: string, work: () => Promise<T>): Promise<T> {
    if (!SAVEPOINT_NAME_REGEX.test(name)) {
      throw new Error(`SAVEPOINT_NAME_INVALID:${name}`);
    }
    await this.client.query(`SAVEPOINT ${name}`);
    try {
      const result = await work();
      await this.client.query(`RELEASE SAVEPOINT ${name}`);
      return result;
    } catch (error) {
      await this.client.query(`ROLLBACK TO SAVEPOINT ${name}`);
      throw error;
    }
  }
}

// === STORE ===
export class PgWorkflowStore implements WorkflowStore {
  constructor(private pool: SqlPool) {}

  async transaction<T>(work: (tx: WorkflowTx) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(new PgWorkflowTx(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  findUser(userId: UserId): Promise<UserRecord | null> {
    return selectUser(this.pool, userId);
  }

  async findDeclaration(declarationId: DeclarationId): Promise<MedicineDeclaration | null> {
    const result = await this.pool.query<DeclarationRow>(
      `SELECT ${DECLARATION_COLUMNS} FROM medicine_declarations d WHERE d.declaration_id = $1`,
      [declarationId]
    );
    return result.rows.length === 0 ? null : toDeclaration(result.rows[0]);
  }

  async listDeclarations(filter: DeclarationFilter): Promise<MedicineDeclaration[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.citizenId) {
      params.push(filter.citizenId);
      conditions.push(`d.citizen_id = $${params.length}`);
    }
    if (filter.status) {
      params.push(filter.status);
      conditions.push(`d.status = $${params.length}`);
    }
    params.push(filter.limit, filter.offset);

    const result = await this.pool.query<DeclarationRow>(
      `SELECT ${DECLARATION_COLUMNS}
       FROM medicine_declarations d
       ${conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : ''}
       ORDER BY d.created_at ASC, d.declaration_id ASC
       LIMIT $${params.length - 1} OFFSET $${params.length}`,
      params
    );
    return result.rows.map(toDeclaration);
  }

  async findProposition(propositionId: PropositionId): Promise<PropositionListing | null> {
    const result = await this.pool.query<ListingRow>(
      `SELECT ${PROPOSITION_COLUMNS}, ${DECLARATION_COLUMNS}, ${PHARMACY_COLUMNS}
       FROM medicine_propositions p
       JOIN medicine_declarations d ON d.declaration_id = p.declaration_id
       LEFT JOIN pharmacies ph ON ph.pharmacy_id = d.pharmacy_id
       WHERE p.proposition_id = $1`,
      [propositionId]
    );
    return result.rows.length === 0 ? null : toListing(result.rows[0]);
  }

  async findPropositionByDeclaration(declarationId: DeclarationId): Promise<MedicineProposition | null> {
    const result = await this.pool.query<PropositionRow>(
      `SELECT ${PROPOSITION_COLUMNS} FROM medicine_propositions p WHERE p.declaration_id = $1`,
      [declarationId]
    );
    return result.rows.length === 0 ? null : toProposition(result.rows[0]);
  }

  async listAvailablePropositions(filter: PropositionFilter): Promise<PropositionListing[]> {
    const params: unknown[] = [filter.declarationStatuses, filter.expiringAfter];
    let cityCondition = '';
    if (filter.city) {
      params.push(filter.city);
      // Plain substring match: % and _ in the filter are not wildcards
      cityCondition = `AND position(lower($${params.length}) in lower(ph.city)) > 0`;
    }
    params.push(filter.limit, filter.offset);

    const result = await this.pool.query<ListingRow>(
      `SELECT ${PROPOSITION_COLUMNS}, ${DECLARATION_COLUMNS}, ${PHARMACY_COLUMNS}
       FROM medicine_propositions p
       JOIN medicine_declarations d ON d.declaration_id = p.declaration_id
       LEFT JOIN pharmacies ph ON ph.pharmacy_id = d.pharmacy_id
       WHERE p.status = 'AVAILABLE'
         AND p.is_active = TRUE
         AND d.status = ANY($1::text[])
         AND d.expiration_date > $2
         AND d.is_imported = FALSE
         AND d.is_recalled = FALSE
         ${cityCondition}
       ORDER BY d.expiration_date ASC, p.proposition_id ASC
       LIMIT $${params.length - 1} OFFSET $${params.length}`,
      params
    );
    return result.rows.map(toListing);
  }

  async listAuditEntries(filter: AuditFilter): Promise<AuditLogEntry[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.entityType) {
      params.push(filter.entityType);
      conditions.push(`entity_type = $${params.length}`);
    }
    if (filter.entityId) {
      params.push(filter.entityId);
      conditions.push(`entity_id = $${params.length}`);
    }
    if (filter.actorId) {
      params.push(filter.actorId);
      conditions.push(`actor_id = $${params.length}`);
    }
    params.push(filter.limit);

    const result = await this.pool.query<AuditRow>(
      `SELECT audit_entry_id, actor_id, action, entity_type, entity_id, details, created_at
       FROM audit_log
       ${conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : ''}
       ORDER BY created_at DESC, audit_entry_id DESC
       LIMIT $${params.length}`,
      params
    );
    return result.rows.map(toAuditEntry);
  }
}
