/**
 * Attendance agent
 * Records and reports player attendance
 */

import {
  AttendanceAnalysisRequestSchema,
  AttendanceRecordSchema,
  AttendanceReportRequestSchema,
} from '../../api/schemas.js';
import { ToolRegistry } from '../../tools/registry.js';
import { defineTool } from '../../tools/types.js';
import type { AgentService } from '../types.js';

// Attendance has no storage or analytics yet, so the tools need nothing injected
export type AttendanceDeps = Record<string, never>;

export const ATTENDANCE_SERVICE_NAME = 'attendance-agent';

export const attendanceService: AgentService<AttendanceDeps> = {
  name: ATTENDANCE_SERVICE_NAME,
  description: 'Attendance recording and reporting',

  createTools() {
    return new ToolRegistry([
      defineTool({
        name: 'record_attendance',
        description: 'Record attendance for a player at a specific event',
        input: AttendanceRecordSchema,
        handler: async (input, context) => {
          context.logger.info(
            { playerId: input.player_id, eventId: input.event_id, status: input.status },
            'Attendance recorded'
          );
          return {
            success: true,
            message: 'Attendance recorded successfully',
            record_id: `att_${input.player_id}_${input.event_id}`,
            player_id: input.player_id,
            event_id: input.event_id,
            status: input.status,
          };
        },
      }),

      defineTool({
        name: 'analyze_attendance_patterns',
        description: 'Analyze attendance patterns for a team or specific players',
        input: AttendanceAnalysisRequestSchema,
        handler: async (input) => ({
          success: true,
          message: 'Attendance analysis completed',
          team_id: input.team_id,
          patterns: {
            total_events: 0,
            average_attendance_rate: 0.0,
            most_consistent_players: [],
            attendance_trends: {},
          },
        }),
      }),

      defineTool({
        name: 'get_attendance_report',
        description: 'Generate attendance report for a team or specific event',
        input: AttendanceReportRequestSchema,
        handler: async (input) => ({
          success: true,
          message: 'Attendance report generated',
          team_id: input.team_id,
          event_id: input.event_id ?? null,
          report_data: {
            total_players: 0,
            present_count: 0,
            absent_count: 0,
            late_count: 0,
          },
        }),
      }),
    ]);
  },
};
