import { DeclarationId, MedicineStatus, PharmacyId, PropositionId, PropositionStatus, UserId } from '../../src/domain-types';
import { MedicineDeclaration } from '../../src/domain/declaration/declaration-types';
import { isExpirable, MedicineProposition } from '../../src/domain/proposition/proposition-logic';
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
} from '../../src/application/workflow-store';

interface MemoryState {
  users: Map<string, UserRecord>;
  pharmacies: Map<string, PharmacyRecord>;
  declarations: Map<string, MedicineDeclaration>;
  propositions: Map<string, MedicineProposition>;
  audit: AuditLogEntry[];
}

export type FailPoint =
  | 'insertDeclaration'
  | 'updateDeclaration'
  | 'insertProposition'
  | 'updateProposition'
  | 'insertAuditEntry';

interface InjectedFailure {
  error: Error;
  remaining: number;
}

const clone = <T>(value: T): T => structuredClone(value);

/**
 * In-process stand-in for PgWorkflowStore. Transactions run one at a time
 * (the way row locks would serialise them) and roll back to a snapshot on
 * error. Savepoints snapshot the same way.
 */
export class MemoryWorkflowStore implements WorkflowStore {
  state: MemoryState = {
    users: new Map(),
    pharmacies: new Map(),
    declarations: new Map(),
    propositions: new Map(),
    audit: [],
  };
  commits = 0;
  rollbacks = 0;

  private queue: Promise<unknown> = Promise.resolve();
  private failures = new Map<FailPoint, InjectedFailure>();

  // === test helpers ===

  addUser(user: Omit<UserRecord, 'isActive'> & { isActive?: boolean }): UserRecord {
    const record: UserRecord = { ...user, isActive: user.isActive ?? true };
    this.state.users.set(record.userId, record);
    return record;
  }

  addPharmacy(pharmacy: PharmacyRecord): PharmacyRecord {
    this.state.pharmacies.set(pharmacy.pharmacyId, pharmacy);
    return pharmacy;
  }

  // Makes the next `times` calls at `point` throw `error`.
  failOn(point: FailPoint, error: Error = new Error(`INJECTED_${point}`), times = 1): void {
    this.failures.set(point, { error, remaining: times });
  }

  auditEntries(): AuditLogEntry[] {
    return clone(this.state.audit);
  }

  allDeclarations(): MedicineDeclaration[] {
    return clone([...this.state.declarations.values()]);
  }

  allPropositions(): MedicineProposition[] {
    return clone([...this.state.propositions.values()]);
  }

  maybeFail(point: FailPoint): void {
    const failure = this.failures.get(point);
    if (!failure) return;
    failure.remaining -= 1;
    if (failure.remaining <= 0) {
      this.failures.delete(point);
    }
    throw failure.error;
  }

  // === WorkflowStore ===

  transaction<T>(work: (tx: WorkflowTx) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.runTransaction(work));
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async runTransaction<T>(work: (tx: WorkflowTx) => Promise<T>): Promise<T> {
    const snapshot = clone(this.state);
    try {
      const result = await work(new MemoryWorkflowTx(this));
      this.commits += 1;
      return result;
    } catch (error) {
      this.state = snapshot;
      this.rollbacks += 1;
      throw error;
    }
  }

  async findUser(userId: UserId): Promise<UserRecord | null> {
    const user = this.state.users.get(userId);
    return user ? clone(user) : null;
  }

  async findDeclaration(declarationId: DeclarationId): Promise<MedicineDeclaration | null> {
    const declaration = this.state.declarations.get(declarationId);
    return declaration ? clone(declaration) : null;
  }

  async listDeclarations(filter: DeclarationFilter): Promise<MedicineDeclaration[]> {
    return clone(
      [...this.state.declarations.values()]
        .filter((d) => (filter.citizenId ? d.citizenId === filter.citizenId : true))
        .filter((d) => (filter.status ? d.status === filter.status : true))
        .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.declarationId.localeCompare(b.declarationId))
        .slice(filter.offset, filter.offset + filter.limit)
    );
  }

  async findProposition(propositionId: PropositionId): Promise<PropositionListing | null> {
    const proposition = this.state.propositions.get(propositionId);
    return proposition ? this.toListing(proposition) : null;
  }

  async findPropositionByDeclaration(declarationId: DeclarationId): Promise<MedicineProposition | null> {
    const proposition = [...this.state.propositions.values()].find((p) => p.declarationId === declarationId);
    return proposition ? clone(proposition) : null;
  }

  async listAvailablePropositions(filter: PropositionFilter): Promise<PropositionListing[]> {
    const city = filter.city?.toLowerCase();
    return [...this.state.propositions.values()]
      .map((proposition) => this.toListing(proposition))
      .filter(({ proposition, declaration, pharmacy }) => {
        if (proposition.status !== 'AVAILABLE' || !proposition.isActive) return false;
        if (!filter.declarationStatuses.includes(declaration.status)) return false;
        if (declaration.expirationDate.getTime() <= filter.expiringAfter.getTime()) return false;
        if (declaration.isImported || declaration.isRecalled) return false;
        if (city && !(pharmacy && pharmacy.city.toLowerCase().includes(city))) return false;
        return true;
      })
      .sort(
        (a, b) =>
          a.declaration.expirationDate.getTime() - b.declaration.expirationDate.getTime() ||
          a.proposition.propositionId.localeCompare(b.proposition.propositionId)
      )
      .slice(filter.offset, filter.offset + filter.limit);
  }

  async listAuditEntries(filter: AuditFilter): Promise<AuditLogEntry[]> {
    return clone(
      this.state.audit
        .map((entry, index) => ({ entry, index }))
        .filter(({ entry }) => (filter.entityType ? entry.entityType === filter.entityType : true))
        .filter(({ entry }) => (filter.entityId ? entry.entityId === filter.entityId : true))
        .filter(({ entry }) => (filter.actorId ? entry.actorId === filter.actorId : true))
        .sort((a, b) => b.entry.createdAt.getTime() - a.entry.createdAt.getTime() || b.index - a.index)
        .slice(0, filter.limit)
        .map(({ entry }) => entry)
    );
  }

  private toListing(proposition: MedicineProposition): PropositionListing {
    const declaration = this.state.declarations.get(proposition.declarationId);
    if (!declaration) {
      throw new Error(`PROPOSITION_DECLARATION_MISSING:${proposition.propositionId}`);
    }
    const pharmacy = declaration.pharmacyId ? this.state.pharmacies.get(declaration.pharmacyId) ?? null : null;
    return clone({ proposition, declaration, pharmacy });
  }
}

class MemoryWorkflowTx implements WorkflowTx {
  constructor(private store: MemoryWorkflowStore) {}

  findUser(userId: UserId): Promise<UserRecord | null> {
    return this.store.findUser(userId);
  }

  async findPharmacy(pharmacyId: PharmacyId): Promise<PharmacyRecord | null> {
    const pharmacy = this.store.state.pharmacies.get(pharmacyId);
    return pharmacy ? clone(pharmacy) : null;
  }

  lockDeclaration(declarationId: DeclarationId): Promise<MedicineDeclaration | null> {
    return this.store.findDeclaration(declarationId);
  }

  async insertDeclaration(declaration: MedicineDeclaration): Promise<void> {
    this.store.maybeFail('insertDeclaration');
    if (this.store.state.declarations.has(declaration.declarationId)) {
      throw new Error('duplicate key value violates unique constraint "medicine_declarations_pkey"');
    }
    this.store.state.declarations.set(declaration.declarationId, clone(declaration));
  }

  async updateDeclaration(declaration: MedicineDeclaration, expectedStatus: MedicineStatus): Promise<boolean> {
    this.store.maybeFail('updateDeclaration');
    const current = this.store.state.declarations.get(declaration.declarationId);
    if (!current || current.status !== expectedStatus) return false;
    this.store.state.declarations.set(declaration.declarationId, clone(declaration));
    return true;
  }

  async lockProposition(propositionId: PropositionId): Promise<MedicineProposition | null> {
    const proposition = this.store.state.propositions.get(propositionId);
    return proposition ? clone(proposition) : null;
  }

  async insertProposition(proposition: MedicineProposition): Promise<void> {
    this.store.maybeFail('insertProposition');
    const duplicate = [...this.store.state.propositions.values()].some(
      (p) => p.declarationId === proposition.declarationId
    );
    if (duplicate) {
      throw new Error('duplicate key value violates unique constraint "medicine_propositions_declaration_id_key"');
    }
    this.store.state.propositions.set(proposition.propositionId, clone(proposition));
  }

  async updateProposition(proposition: MedicineProposition, expectedStatus: PropositionStatus): Promise<boolean> {
    this.store.maybeFail('updateProposition');
    const current = this.store.state.propositions.get(proposition.propositionId);
    if (!current || current.status !== expectedStatus) return false;
    this.store.state.propositions.set(proposition.propositionId, clone(proposition));
    return true;
  }

  async lockExpirablePropositions(now: Date): Promise<MedicineProposition[]> {
    const { declarations, propositions } = this.store.state;
    return clone(
      [...propositions.values()]
        .filter((p) => {
          const declaration = declarations.get(p.declarationId);
          return declaration !== undefined && isExpirable(p, declaration, now);
        })
        .sort((a, b) => a.propositionId.localeCompare(b.propositionId))
    );
  }

  async insertAuditEntry(entry: AuditLogEntry): Promise<void> {
    this.store.maybeFail('insertAuditEntry');
    this.store.state.audit.push(clone(entry));
  }

  async savepoint<T>(name: string, work: () => Promise<T>): Promise<T> {
    const snapshot = clone(this.store.state);
    try {
      return await work();
    } catch (error) {
      this.store.state = snapshot;
      throw error;
    }
  }
}
