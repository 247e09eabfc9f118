/**
 * API Types
 * Shared request/response records between the agent services
 */

import type { z } from 'zod';
import type {
  CandidateEventSchema,
  UploadedFileSchema,
  EventCreationRequestSchema,
  FailedEventSchema,
  ScheduleParseRequestSchema,
  ScheduleEventSchema,
  ScheduleEventsQuerySchema,
  AttendanceRecordSchema,
  AttendanceAnalysisRequestSchema,
  AttendanceReportRequestSchema,
  ScheduleUploadSchema,
  ReminderSchema,
  AttendanceDataSchema,
  ErrorKindSchema,
} from './schemas.js';

export type CandidateEvent = z.infer<typeof CandidateEventSchema>;
export type UploadedFile = z.infer<typeof UploadedFileSchema>;
export type EventCreationRequest = z.infer<typeof EventCreationRequestSchema>;
export type FailedEvent = z.infer<typeof FailedEventSchema>;
export type ScheduleParseRequest = z.infer<typeof ScheduleParseRequestSchema>;
export type ScheduleEvent = z.infer<typeof ScheduleEventSchema>;
export type ScheduleEventsQuery = z.infer<typeof ScheduleEventsQuerySchema>;
export type AttendanceRecord = z.infer<typeof AttendanceRecordSchema>;
export type AttendanceAnalysisRequest = z.infer<typeof AttendanceAnalysisRequestSchema>;
export type AttendanceReportRequest = z.infer<typeof AttendanceReportRequestSchema>;
export type ScheduleUpload = z.infer<typeof ScheduleUploadSchema>;
export type Reminder = z.infer<typeof ReminderSchema>;
export type AttendanceData = z.infer<typeof AttendanceDataSchema>;

/**
 * Error classes a step can report
 */
export type ErrorKind = z.infer<typeof ErrorKindSchema>;

/**
 * Output of the image analysis tool
 */
export interface ImageAnalysisResult {
  success: boolean;
  message: string;
  events: CandidateEvent[];
  confidence: number;
  file_name: string;
  team_id: number;
  error?: string;
  error_kind?: ErrorKind;
}

/**
 * Output of the event creation tool
 */
export interface EventCreationResult {
  success: boolean;
  message: string;
  team_id: number;
  events_created: number;
  events_failed: number;
  created_events: unknown[];
  failed_events: FailedEvent[];
}

/**
 * Pipeline states of the coordinator
 */
export type PipelineState =
  | 'RECEIVED'
  | 'ANALYZING'
  | 'CREATING'
  | 'ASSEMBLING'
  | 'DONE'
  | 'FAILED';

/**
 * Combined result of one schedule image upload
 */
export interface OrchestrationResult {
  success: boolean;
  message: string;
  state: Extract<PipelineState, 'DONE' | 'FAILED'>;
  team_id: number;
  events_found: number;
  events_created: number;
  events_failed: number;
  parsed_events: CandidateEvent[];
  created_events: unknown[];
  failed_events: FailedEvent[];
  confidence?: number;
  error?: string;
  error_kind?: ErrorKind;
  completed_at: string;
}

/**
 * Health check response
 */
export interface HealthResponse {
  status: 'healthy';
  service: string;
}

/**
 * Tool listing entry
 */
export interface ToolInfo {
  name: string;
  description: string;
}

/**
 * Tool listing response
 */
export interface ToolListResponse {
  service: string;
  tools: ToolInfo[];
}

/**
 * Error body returned by the HTTP transport
 */
export interface ErrorResponse {
  success: false;
  error: string;
  message?: string;
  details?: unknown;
}
