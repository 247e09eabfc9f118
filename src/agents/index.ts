/**
 * Agents module
 * Wires each agent service to its dependencies from configuration
 */

import type pino from 'pino';
import type { Config, ServiceName } from '../config/index.js';
import { DelegationClient, type FetchLike } from '../delegation/client.js';
import { attendanceService } from './attendance/index.js';
import { coordinatorService } from './coordinator/index.js';
import { HttpScheduleImageAnalyzer, scheduleService } from './schedule/index.js';
import { bindService, type BoundService } from './types.js';

export { attendanceService, ATTENDANCE_SERVICE_NAME } from './attendance/index.js';
export { coordinatorService, ScheduleImagePipeline, COORDINATOR_SERVICE_NAME } from './coordinator/index.js';
export { scheduleService, HttpScheduleImageAnalyzer, decodeUploadedFile, SCHEDULE_SERVICE_NAME } from './schedule/index.js';
export { bindService } from './types.js';
export type { AgentService, BoundService } from './types.js';
export type { CoordinatorDeps } from './coordinator/index.js';
export type { ScheduleDeps, ScheduleImageAnalyzer, ScheduleImage, ImageAnalysis } from './schedule/index.js';
export type { AttendanceDeps } from './attendance/index.js';

export interface ServiceWiringOptions {
  logger: pino.Logger;
  fetch?: FetchLike;
}

/**
 * Build the named service with production dependencies
 */
export function createService(
  name: ServiceName,
  config: Config,
  options: ServiceWiringOptions
): BoundService {
  const client = new DelegationClient({
    timeoutMs: config.delegationTimeoutMs,
    fetch: options.fetch,
    logger: options.logger.child({ component: 'delegation' }),
  });

  switch (name) {
    case 'coordinator':
      return bindService(coordinatorService, {
        client,
        scheduleServiceUrl: config.scheduleServiceUrl,
        attendanceServiceUrl: config.attendanceServiceUrl,
      });
    case 'schedule':
      return bindService(scheduleService, {
        client,
        analyzer: new HttpScheduleImageAnalyzer(client, config.visionServiceUrl),
        eventStoreUrl: config.eventStoreUrl,
      });
    case 'attendance':
      return bindService(attendanceService, {});
  }
}
