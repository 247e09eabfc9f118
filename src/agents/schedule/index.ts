/**
 * Schedule agent
 * Parses schedules and turns schedule images into calendar events
 */

import {
  EventCreationRequestSchema,
  ScheduleEventSchema,
  ScheduleEventsQuerySchema,
  ScheduleParseRequestSchema,
  UploadedFileSchema,
} from '../../api/schemas.js';
import type { DelegationClient } from '../../delegation/client.js';
import { ToolRegistry } from '../../tools/registry.js';
import { defineTool } from '../../tools/types.js';
import type { AgentService } from '../types.js';
import type { ScheduleImageAnalyzer } from './analyzer.js';
import { analyzeScheduleImage, createScheduleEvents } from './steps.js';

export { HttpScheduleImageAnalyzer } from './analyzer.js';
export type { ScheduleImageAnalyzer, ScheduleImage, ImageAnalysis } from './analyzer.js';
export { decodeUploadedFile } from './decode.js';

export interface ScheduleDeps {
  client: DelegationClient;
  analyzer: ScheduleImageAnalyzer;
  eventStoreUrl: string;
}

export const SCHEDULE_SERVICE_NAME = 'schedule-agent';

export const scheduleService: AgentService<ScheduleDeps> = {
  name: SCHEDULE_SERVICE_NAME,
  description: 'Schedule parsing and calendar event creation',

  createTools(deps) {
    return new ToolRegistry([
      defineTool({
        name: 'parse_schedule',
        description: 'Parse schedule content and extract structured events',
        input: ScheduleParseRequestSchema,
        // Format parsing is not implemented; the detected format echoes the request
        handler: async (input) => ({
          success: true,
          message: 'Schedule parsed successfully',
          events: [],
          total_events: 0,
          format_detected: input.format,
        }),
      }),

      defineTool({
        name: 'update_schedule_event',
        description: 'Update an existing schedule event',
        input: ScheduleEventSchema,
        handler: async (input) => ({
          success: true,
          message: 'Event updated successfully',
          event_id: input.event_id,
          team_id: input.team_id,
        }),
      }),

      defineTool({
        name: 'get_schedule_events',
        description: 'Retrieve schedule events for a team',
        input: ScheduleEventsQuerySchema,
        handler: async (input) => ({
          success: true,
          message: 'Events retrieved successfully',
          events: [],
          team_id: input.team_id,
          date_range: input.date_range ?? null,
          total_events: 0,
        }),
      }),

      defineTool({
        name: 'analyze_schedule_image',
        description: 'Extract candidate events from an uploaded schedule image',
        input: UploadedFileSchema,
        handler: (input, context) => analyzeScheduleImage(input, deps.analyzer, context.logger),
      }),

      defineTool({
        name: 'create_schedule_events',
        description: 'Create calendar events for a team, one at a time',
        input: EventCreationRequestSchema,
        handler: (input, context) =>
          createScheduleEvents(input, deps.client, deps.eventStoreUrl, context.logger),
      }),
    ]);
  },
};
