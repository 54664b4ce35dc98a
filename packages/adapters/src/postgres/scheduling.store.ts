import type {
  DriverCandidate,
  Employee,
  Facility,
  IsoDate,
  MaintenanceDuePolicy,
  MaintenanceRecord,
  Route,
  SchedulingStorePort,
  Trip,
  TripFilter,
  TripKey,
  TripSlot,
  TruckType,
  TruckTypeCode,
  TruckWithWasteType,
  WasteType,
} from '@waste-ops/domain';
import { formatWallClock } from '@waste-ops/domain';
import {
  poolExecutor,
  withTransaction,
  type DbPool,
  type SqlExecutor,
  type TransactionalSqlExecutor,
} from './pool.js';

const ROUTE_COLUMNS = `r.id, r.waste_type AS "wasteType", r.length_km AS "lengthKm"`;
const TRUCK_COLUMNS = `t.id, t.truck_type AS "truckType", t.capacity, tt.waste_type AS "wasteType"`;
const FACILITY_COLUMNS = `f.id, f.waste_type AS "wasteType", f.address`;
const EMPLOYEE_COLUMNS = `e.id, e.name, e.hire_date AS "hireDate"`;
const TRIP_COLUMNS = `
  tr.route_id AS "routeId",
  tr.truck_id AS "truckId",
  tr.start_time AS "startTime",
  tr.volume,
  tr.driver_high AS "driverHigh",
  tr.driver_low AS "driverLow",
  tr.facility_id AS "facilityId"`;

interface FacilityRow {
  id: number;
  wasteType: WasteType;
  address: string | null;
}

interface DriverRow {
  employeeId: number;
  hireDate: IsoDate;
  truckTypes: TruckTypeCode[];
}

interface ExistsRow {
  exists: boolean;
}

export class PgSchedulingStore implements SchedulingStorePort {
  /**
   * @param db executor used for every query
   * @param connector present outside a transaction; used to open one
   */
  constructor(
    private readonly db: SqlExecutor,
    private readonly connector: TransactionalSqlExecutor | null = null,
  ) {}

  static fromPool(pool: DbPool): PgSchedulingStore {
    const executor = poolExecutor(pool);
    return new PgSchedulingStore(executor, executor);
  }

  async withTransaction<T>(fn: (store: SchedulingStorePort) => Promise<T>): Promise<T> {
    // Already inside a transaction: join it.
    if (!this.connector) return fn(this);
    return withTransaction(this.connector, (client) => fn(new PgSchedulingStore(client)));
  }

  // ─── Routes ──────────────────────────────────────────────────────────────────

  async findRoute(routeId: number): Promise<Route | null> {
    const { rows } = await this.db.query<Route>(
      `SELECT ${ROUTE_COLUMNS} FROM waste_ops.route r WHERE r.id = $1`,
      [routeId],
    );
    return rows[0] ?? null;
  }

  async listRoutesByWasteType(wasteType: WasteType): Promise<Route[]> {
    const { rows } = await this.db.query<Route>(
      `SELECT ${ROUTE_COLUMNS} FROM waste_ops.route r WHERE r.waste_type = $1 ORDER BY r.id`,
      [wasteType],
    );
    return rows;
  }

  // ─── Trucks ──────────────────────────────────────────────────────────────────

  async findTruck(truckId: number): Promise<TruckWithWasteType | null> {
    const { rows } = await this.db.query<TruckWithWasteType>(
      `SELECT ${TRUCK_COLUMNS}
       FROM waste_ops.truck t
       INNER JOIN waste_ops.truck_type tt ON tt.code = t.truck_type
       WHERE t.id = $1`,
      [truckId],
    );
    return rows[0] ?? null;
  }

  async listTrucksByWasteType(wasteType: WasteType): Promise<TruckWithWasteType[]> {
    const { rows } = await this.db.query<TruckWithWasteType>(
      `SELECT ${TRUCK_COLUMNS}
       FROM waste_ops.truck t
       INNER JOIN waste_ops.truck_type tt ON tt.code = t.truck_type
       WHERE tt.waste_type = $1
       ORDER BY t.capacity DESC, t.id`,
      [wasteType],
    );
    return rows;
  }

  async findTruckType(code: TruckTypeCode): Promise<TruckType | null> {
    const { rows } = await this.db.query<TruckType>(
      `SELECT code, waste_type AS "wasteType" FROM waste_ops.truck_type WHERE code = $1`,
      [code],
    );
    return rows[0] ?? null;
  }

  // ─── Facilities ──────────────────────────────────────────────────────────────

  async findFacility(facilityId: number): Promise<Facility | null> {
    const { rows } = await this.db.query<FacilityRow>(
      `SELECT ${FACILITY_COLUMNS} FROM waste_ops.facility f WHERE f.id = $1`,
      [facilityId],
    );
    return rows[0] ? mapFacility(rows[0]) : null;
  }

  async listFacilitiesByWasteType(wasteType: WasteType): Promise<Facility[]> {
    const { rows } = await this.db.query<FacilityRow>(
      `SELECT ${FACILITY_COLUMNS} FROM waste_ops.facility f WHERE f.waste_type = $1 ORDER BY f.id`,
      [wasteType],
    );
    return rows.map(mapFacility);
  }

  // ─── Drivers & employees ─────────────────────────────────────────────────────

  async listDrivers(): Promise<DriverCandidate[]> {
    const { rows } = await this.db.query<DriverRow>(
      `SELECT
         e.id AS "employeeId",
         e.hire_date AS "hireDate",
         array_agg(d.truck_type ORDER BY d.truck_type) AS "truckTypes"
       FROM waste_ops.driver d
       INNER JOIN waste_ops.employee e ON e.id = d.employee_id
       GROUP BY e.id, e.hire_date
       ORDER BY e.hire_date, e.id`,
    );
    return rows.map((row) => ({
      employeeId: row.employeeId,
      hireDate: row.hireDate,
      truckTypes: new Set(row.truckTypes),
    }));
  }

  async isDriver(employeeId: number): Promise<boolean> {
    return this.exists(`SELECT 1 FROM waste_ops.driver WHERE employee_id = $1`, [employeeId]);
  }

  async findEmployeesByName(name: string): Promise<Employee[]> {
    const { rows } = await this.db.query<Employee>(
      `SELECT ${EMPLOYEE_COLUMNS} FROM waste_ops.employee e WHERE e.name = $1 ORDER BY e.id`,
      [name],
    );
    return rows;
  }

  // ─── Trips ───────────────────────────────────────────────────────────────────

  async listTripSlots(fromDate: IsoDate, toDate: IsoDate): Promise<TripSlot[]> {
    const { rows } = await this.db.query<TripSlot>(
      `SELECT ${TRIP_COLUMNS}, r.length_km AS "lengthKm"
       FROM waste_ops.trip tr
       INNER JOIN waste_ops.route r ON r.id = tr.route_id
       WHERE tr.start_time::date BETWEEN $1::date AND $2::date
       ORDER BY tr.start_time, tr.route_id`,
      [fromDate, toDate],
    );
    return rows;
  }

  async listTripsOnDate(filter: TripFilter, date: IsoDate): Promise<Trip[]> {
    const [column, value] = filterColumn(filter);
    const { rows } = await this.db.query<Trip>(
      `SELECT ${TRIP_COLUMNS}
       FROM waste_ops.trip tr
       WHERE tr.${column} = $1 AND tr.start_time::date = $2::date
       ORDER BY tr.start_time, tr.route_id`,
      [value, date],
    );
    return rows;
  }

  async listTripPairs(): Promise<Array<[number, number]>> {
    const { rows } = await this.db.query<{ high: number; low: number }>(
      `SELECT DISTINCT driver_high AS high, driver_low AS low FROM waste_ops.trip`,
    );
    return rows.map((row): [number, number] => [row.high, row.low]);
  }

  async insertTrip(trip: Trip): Promise<void> {
    await this.db.query(
      `INSERT INTO waste_ops.trip
         (route_id, truck_id, start_time, volume, driver_high, driver_low, facility_id)
       VALUES ($1, $2, $3::timestamp, $4, $5, $6, $7)`,
      [
        trip.routeId,
        trip.truckId,
        formatWallClock(trip.startTime),
        trip.volume,
        trip.driverHigh,
        trip.driverLow,
        trip.facilityId,
      ],
    );
  }

  async updateTripFacility(keys: readonly TripKey[], facilityId: number): Promise<number> {
    if (keys.length === 0) return 0;
    const result = await this.db.query(
      `UPDATE waste_ops.trip tr
       SET facility_id = $1
       FROM unnest($2::int[], $3::timestamp[]) AS k(route_id, start_time)
       WHERE tr.route_id = k.route_id AND tr.start_time = k.start_time`,
      [
        facilityId,
        keys.map((k) => k.routeId),
        keys.map((k) => formatWallClock(k.startTime)),
      ],
    );
    return result.rowCount ?? 0;
  }

  // ─── Maintenance & technicians ───────────────────────────────────────────────

  async listMaintenanceOnDate(date: IsoDate): Promise<MaintenanceRecord[]> {
    const { rows } = await this.db.query<MaintenanceRecord>(
      `SELECT truck_id AS "truckId", technician_id AS "technicianId", date
       FROM waste_ops.maintenance
       WHERE date = $1::date
       ORDER BY truck_id`,
      [date],
    );
    return rows;
  }

  async listMaintenanceDue(
    date: IsoDate,
    policy: MaintenanceDuePolicy,
  ): Promise<TruckWithWasteType[]> {
    // Any record within the interval, including future bookings, keeps a truck
    // out of the backlog.
    const { rows } = await this.db.query<TruckWithWasteType>(
      `SELECT ${TRUCK_COLUMNS}
       FROM waste_ops.truck t
       INNER JOIN waste_ops.truck_type tt ON tt.code = t.truck_type
       WHERE EXISTS (SELECT 1 FROM waste_ops.maintenance m WHERE m.truck_id = t.id)
         AND NOT EXISTS (
           SELECT 1 FROM waste_ops.maintenance m
           WHERE m.truck_id = t.id AND $1::date - m.date <= $2
         )
         AND NOT EXISTS (
           SELECT 1 FROM waste_ops.maintenance m
           WHERE m.truck_id = t.id AND m.date - $1::date BETWEEN 0 AND $3
         )
       ORDER BY t.id`,
      [date, policy.maintenanceIntervalDays, policy.maintenanceLookaheadDays],
    );
    return rows;
  }

  async listQualifiedTechnicians(truckType: TruckTypeCode): Promise<Employee[]> {
    const { rows } = await this.db.query<Employee>(
      `SELECT ${EMPLOYEE_COLUMNS}
       FROM waste_ops.technician te
       INNER JOIN waste_ops.employee e ON e.id = te.employee_id
       WHERE te.truck_type = $1
       ORDER BY e.id`,
      [truckType],
    );
    return rows;
  }

  async insertMaintenance(record: MaintenanceRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO waste_ops.maintenance (truck_id, technician_id, date) VALUES ($1, $2, $3::date)`,
      [record.truckId, record.technicianId, record.date],
    );
  }

  async hasTechnicianQualification(
    employeeId: number,
    truckType: TruckTypeCode,
  ): Promise<boolean> {
    return this.exists(
      `SELECT 1 FROM waste_ops.technician WHERE employee_id = $1 AND truck_type = $2`,
      [employeeId, truckType],
    );
  }

  async insertTechnician(employeeId: number, truckType: TruckTypeCode): Promise<void> {
    await this.db.query(
      `INSERT INTO waste_ops.technician (employee_id, truck_type) VALUES ($1, $2)`,
      [employeeId, truckType],
    );
  }

  private async exists(subquery: string, params: unknown[]): Promise<boolean> {
    const { rows } = await this.db.query<ExistsRow>(`SELECT EXISTS (${subquery}) AS "exists"`, params);
    return rows[0]?.exists ?? false;
  }
}

function filterColumn(filter: TripFilter): ['route_id' | 'truck_id' | 'facility_id', number] {
  if ('routeId' in filter) return ['route_id', filter.routeId];
  if ('truckId' in filter) return ['truck_id', filter.truckId];
  return ['facility_id', filter.facilityId];
}

function mapFacility(row: FacilityRow): Facility {
  return row.address === null
    ? { id: row.id, wasteType: row.wasteType }
    : { id: row.id, wasteType: row.wasteType, address: row.address };
}
