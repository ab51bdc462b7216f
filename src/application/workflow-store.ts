import {
  AuditAction,
  AuditEntityType,
  AuditEntryId,
  DeclarationId,
  MedicineStatus,
  PharmacyId,
  PropositionId,
  PropositionStatus,
  UserId,
  UserRole,
} from '../domain-types';
import { MedicineDeclaration } from '../domain/declaration/declaration-types';
import { MedicineProposition } from '../domain/proposition/proposition-logic';

export interface UserRecord {
  userId: UserId;
  username: string;
  email: string;
  role: UserRole;
  isActive: boolean;
}

export interface PharmacyRecord {
  pharmacyId: PharmacyId;
  name: string;
  address: string;
  city: string;
}

export interface AuditLogEntry {
  auditEntryId: AuditEntryId;
  actorId: UserId;
  action: AuditAction;
  entityType: AuditEntityType;
  entityId: string | null;
  details: Record<string, unknown>;
  createdAt: Date;
}

export interface PropositionListing {
  proposition: MedicineProposition;
  declaration: MedicineDeclaration;
  pharmacy: PharmacyRecord | null;
}

export interface DeclarationFilter {
  citizenId?: UserId;
  status?: MedicineStatus;
  limit: number;
  offset: number;
}

export interface PropositionFilter {
  city?: string;
  // Declarations must be in one of these statuses to be listed.
  declarationStatuses: readonly MedicineStatus[];
  // Only declarations expiring strictly after this instant are listed.
  expiringAfter: Date;
  limit: number;
  offset: number;
}

export interface AuditFilter {
  entityType?: AuditEntityType;
  entityId?: string;
  actorId?: UserId;
  limit: number;
}

/**
 * Reads and writes available inside one transaction. `lock*` methods take a
 * row lock held until the transaction ends; `update*` methods are
 * compare-and-set on the expected prior status and report whether a row matched.
 */
export interface WorkflowTx {
  findUser(userId: UserId): Promise<UserRecord | null>;
  findPharmacy(pharmacyId: PharmacyId): Promise<PharmacyRecord | null>;

  lockDeclaration(declarationId: DeclarationId): Promise<MedicineDeclaration | null>;
  insertDeclaration(declaration: MedicineDeclaration): Promise<void>;
  updateDeclaration(declaration: MedicineDeclaration, expectedStatus: MedicineStatus): Promise<boolean>;

  lockProposition(propositionId: PropositionId): Promise<MedicineProposition | null>;
  insertProposition(proposition: MedicineProposition): Promise<void>;
  updateProposition(proposition: MedicineProposition, expectedStatus: PropositionStatus): Promise<boolean>;
  lockExpirablePropositions(now: Date): Promise<MedicineProposition[]>;

  insertAuditEntry(entry: AuditLogEntry): Promise<void>;

  /**
   * Runs `work` inside a savepoint. If it throws, only the savepoint's writes
   * are undone and the error is rethrown; the outer transaction stays usable.
   */
  savepoint<T>(name: string, work: () => Promise<T>): Promise<T>;
}

export interface WorkflowStore {
  transaction<T>(work: (tx: WorkflowTx) => Promise<T>): Promise<T>;

  findUser(userId: UserId): Promise<UserRecord | null>;
  findDeclaration(declarationId: DeclarationId): Promise<MedicineDeclaration | null>;
  listDeclarations(filter: DeclarationFilter): Promise<MedicineDeclaration[]>;
  findProposition(propositionId: PropositionId): Promise<PropositionListing | null>;
  findPropositionByDeclaration(declarationId: DeclarationId): Promise<MedicineProposition | null>;
  listAvailablePropositions(filter: PropositionFilter): Promise<PropositionListing[]>;
  listAuditEntries(filter: AuditFilter): Promise<AuditLogEntry[]>;
}
