/**
 * Team captain agent
 * Coordinates the schedule and attendance agents for one external request
 */

import {
  AttendanceDataSchema,
  AttendancePatternsResponseSchema,
  ReminderSchema,
  ScheduleParseResponseSchema,
  ScheduleUploadSchema,
  UploadedFileSchema,
} from '../../api/schemas.js';
import type { DelegationClient } from '../../delegation/client.js';
import { ToolRegistry } from '../../tools/registry.js';
import { defineTool } from '../../tools/types.js';
import type { AgentService } from '../types.js';
import { ScheduleImagePipeline } from './pipeline.js';

export { ScheduleImagePipeline } from './pipeline.js';

export interface CoordinatorDeps {
  client: DelegationClient;
  scheduleServiceUrl: string;
  attendanceServiceUrl: string;
  now?: () => Date;
}

/**
 * Distinct player ids named by the submitted records, in first-seen order
 */
function playersIn(records: Array<Record<string, unknown>>): string[] {
  const ids = new Set<string>();
  for (const record of records) {
    if (typeof record.player_id === 'string' && record.player_id.length > 0) {
      ids.add(record.player_id);
    }
  }
  return Array.from(ids);
}

export const COORDINATOR_SERVICE_NAME = 'team-captain-agent';

export const coordinatorService: AgentService<CoordinatorDeps> = {
  name: COORDINATOR_SERVICE_NAME,
  description: 'Team captain coordinating schedule and attendance agents',

  createTools(deps) {
    return new ToolRegistry([
      defineTool({
        name: 'process_schedule_image',
        description: 'Extract events from a schedule photo and create them in the team calendar',
        input: UploadedFileSchema,
        handler: (input, context) => {
          const pipeline = new ScheduleImagePipeline({
            client: deps.client,
            scheduleServiceUrl: deps.scheduleServiceUrl,
            logger: context.logger.child({ teamId: input.team_id, fileName: input.file_name }),
            now: deps.now,
          });
          return pipeline.run(input);
        },
      }),

      defineTool({
        name: 'upload_schedule',
        description: 'Upload and parse a team schedule via the schedule agent',
        input: ScheduleUploadSchema,
        handler: async (input) => {
          const result = await deps.client.invokeTool(
            deps.scheduleServiceUrl,
            'parse_schedule',
            { schedule_content: input.schedule_content, format: input.format ?? 'auto' },
            { schema: ScheduleParseResponseSchema }
          );

          if (!result.success || !result.data.success) {
            return {
              success: false,
              message: 'Schedule upload failed',
              parsed_events: [],
              team_id: input.team_id,
              error: result.success
                ? result.data.error ?? 'Schedule agent reported failure'
                : result.error,
            };
          }

          return {
            success: true,
            message: 'Schedule uploaded successfully',
            parsed_events: result.data.events,
            team_id: input.team_id,
          };
        },
      }),

      defineTool({
        name: 'send_reminder',
        description: 'Send a reminder to team members',
        input: ReminderSchema,
        // No notification channel exists yet; the reminder is acknowledged as sent
        handler: async (input, context) => {
          context.logger.info({ teamId: input.team_id, recipients: input.recipients.length }, 'Reminder accepted');
          return {
            success: true,
            message: 'Reminder sent successfully',
            recipients: input.recipients,
            team_id: input.team_id,
          };
        },
      }),

      defineTool({
        name: 'analyze_attendance',
        description: 'Analyze attendance patterns via the attendance agent',
        input: AttendanceDataSchema,
        handler: async (input) => {
          const playerIds = playersIn(input.attendance_records);
          const result = await deps.client.invokeTool(
            deps.attendanceServiceUrl,
            'analyze_attendance_patterns',
            playerIds.length > 0 ? { team_id: input.team_id, player_ids: playerIds } : { team_id: input.team_id },
            { schema: AttendancePatternsResponseSchema }
          );

          if (!result.success || !result.data.success) {
            return {
              success: false,
              message: 'Attendance analysis failed',
              patterns: {},
              team_id: input.team_id,
              error: result.success
                ? result.data.error ?? 'Attendance agent reported failure'
                : result.error,
            };
          }

          return {
            success: true,
            message: 'Attendance analysis completed',
            patterns: result.data.patterns,
            team_id: input.team_id,
          };
        },
      }),
    ]);
  },
};
