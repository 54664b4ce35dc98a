import type { SchedulingPolicy, SchedulingStorePort } from '@waste-ops/domain';
import { DEFAULT_SCHEDULING_POLICY } from '@waste-ops/domain';
import { consoleLogger, type Logger } from '../logger.js';
import { BatchTripSchedulerService } from './batch-trip-scheduler.service.js';
import { MaintenanceSchedulerService } from './maintenance-scheduler.service.js';
import { QualificationImporterService } from './qualification-importer.service.js';
import { TripSchedulerService } from './trip-scheduler.service.js';
import { WasteRerouteService } from './waste-reroute.service.js';
import { WorkmateSphereService } from './workmate-sphere.service.js';

export { AvailabilityResolver } from './availability-resolver.js';
export { BatchTripSchedulerService } from './batch-trip-scheduler.service.js';
export { MaintenanceSchedulerService } from './maintenance-scheduler.service.js';
export {
  QualificationImporterService,
  type QualificationImportReport,
  type RejectedQualification,
} from './qualification-importer.service.js';
export { TripSchedulerService } from './trip-scheduler.service.js';
export { WasteRerouteService, type RerouteResult } from './waste-reroute.service.js';
export { WorkmateSphereService } from './workmate-sphere.service.js';
export { WasteSchedulingFacade } from './waste-scheduling.facade.js';

export interface SchedulingServices {
  trips: TripSchedulerService;
  batches: BatchTripSchedulerService;
  maintenance: MaintenanceSchedulerService;
  reroute: WasteRerouteService;
  workmates: WorkmateSphereService;
  qualifications: QualificationImporterService;
}

export interface SchedulingServiceOptions {
  policy?: SchedulingPolicy;
  logger?: Logger;
}

export function createSchedulingServices(
  store: SchedulingStorePort,
  options: SchedulingServiceOptions = {},
): SchedulingServices {
  const policy = options.policy ?? DEFAULT_SCHEDULING_POLICY;
  const logger = options.logger ?? consoleLogger;
  return {
    trips: new TripSchedulerService(store, policy, logger),
    batches: new BatchTripSchedulerService(store, policy, logger),
    maintenance: new MaintenanceSchedulerService(store, policy, logger),
    reroute: new WasteRerouteService(store, logger),
    workmates: new WorkmateSphereService(store, logger),
    qualifications: new QualificationImporterService(store, logger),
  };
}
