import type {
  Outcome,
  QualificationRecord,
  QualificationRejection,
  SchedulingStorePort,
} from '@waste-ops/domain';
import { fullName, succeed } from '@waste-ops/domain';
import { consoleLogger, type Logger } from '../logger.js';

export interface RejectedQualification {
  readonly record: QualificationRecord;
  readonly reason: QualificationRejection;
}

export interface QualificationImportReport {
  readonly inserted: QualificationRecord[];
  readonly rejected: RejectedQualification[];
}

/**
 * Applies technician qualification claims one by one. Invalid claims are
 * reported and skipped; they never undo the valid ones.
 */
export class QualificationImporterService {
  constructor(
    private readonly store: SchedulingStorePort,
    private readonly logger: Logger = consoleLogger,
  ) {}

  async updateTechnicians(
    records: readonly QualificationRecord[],
  ): Promise<Outcome<QualificationImportReport>> {
    const inserted: QualificationRecord[] = [];
    const rejected: RejectedQualification[] = [];

    for (const record of records) {
      let reason: QualificationRejection | null;
      try {
        reason = await this.apply(record);
      } catch (err) {
        this.logger.error(`[qualification-import] ${fullName(record)} / ${record.truckType} failed`, err);
        reason = 'STORAGE_FAILURE';
      }
      if (reason) rejected.push({ record, reason });
      else inserted.push(record);
    }

    this.logger.info(
      `[qualification-import] ${inserted.length} inserted, ${rejected.length} rejected`,
    );
    return succeed({ inserted, rejected });
  }

  /** Inserts the qualification when valid; returns why it was not otherwise. */
  private async apply(record: QualificationRecord): Promise<QualificationRejection | null> {
    const truckType = await this.store.findTruckType(record.truckType);
    if (!truckType) return 'UNKNOWN_TRUCK_TYPE';

    const [employee, ...others] = await this.store.findEmployeesByName(fullName(record));
    if (!employee || others.length > 0) return 'UNKNOWN_EMPLOYEE';

    if (await this.store.isDriver(employee.id)) return 'EMPLOYEE_IS_DRIVER';
    if (await this.store.hasTechnicianQualification(employee.id, truckType.code)) {
      return 'ALREADY_QUALIFIED';
    }

    await this.store.insertTechnician(employee.id, truckType.code);
    return null;
  }
}
