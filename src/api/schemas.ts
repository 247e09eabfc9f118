/**
 * Zod schemas for tool inputs and service responses
 */

import { z } from 'zod';

/**
 * Schedule schemas
 */
export const EventTypeSchema = z.enum(['practice', 'game']);

export const CandidateEventSchema = z.object({
  title: z.string().min(1),
  date: z.string().min(1),
  time: z.string(),
  location: z.string(),
  type: EventTypeSchema,
  opponent: z.string().optional(),
  description: z.string().optional(),
});

export const UploadedFileSchema = z.object({
  team_id: z.number().int(),
  file_content: z.string(),
  file_name: z.string().min(1),
  file_size: z.number().int().min(1),
  mime_type: z.string().min(1),
  uploaded_at: z.string().min(1),
});

export const EventCreationRequestSchema = z.object({
  team_id: z.number().int(),
  events: z.array(CandidateEventSchema),
});

export const ScheduleParseRequestSchema = z.object({
  schedule_content: z.string(),
  format: z.string().default('auto'),
});

export const ScheduleEventSchema = z.object({
  event_id: z.string().min(1),
  title: z.string(),
  date: z.string(),
  time: z.string(),
  location: z.string(),
  team_id: z.string(),
});

export const ScheduleEventsQuerySchema = z.object({
  team_id: z.string().min(1),
  date_range: z.string().optional(),
});

/**
 * Attendance schemas
 */
export const AttendanceStatusSchema = z.enum(['present', 'absent', 'late']);

export const AttendanceRecordSchema = z.object({
  player_id: z.string().min(1),
  event_id: z.string().min(1),
  status: AttendanceStatusSchema,
  timestamp: z.string(),
  team_id: z.string(),
});

export const AttendanceAnalysisRequestSchema = z.object({
  team_id: z.string().min(1),
  date_range: z.string().optional(),
  player_ids: z.array(z.string()).optional(),
});

export const AttendanceReportRequestSchema = z.object({
  team_id: z.string().min(1),
  event_id: z.string().optional(),
});

/**
 * Coordinator schemas
 */
export const ScheduleUploadSchema = z.object({
  schedule_content: z.string(),
  team_id: z.string().min(1),
  format: z.string().optional(),
});

export const AttendanceDataSchema = z.object({
  attendance_records: z.array(z.record(z.unknown())),
  team_id: z.string().min(1),
});

export const ReminderSchema = z.object({
  message: z.string().min(1),
  recipients: z.array(z.string()),
  team_id: z.string().min(1),
});

/**
 * Responses read back from sibling services
 */
export const ErrorKindSchema = z.enum([
  'decode',
  'validation',
  'upstream_transport',
  'upstream_application',
]);

export const ImageAnalysisResponseSchema = z.object({
  success: z.boolean(),
  events: z.array(CandidateEventSchema).default([]),
  confidence: z.number().min(0).max(1).default(0),
  message: z.string().optional(),
  error: z.string().optional(),
  error_kind: ErrorKindSchema.optional(),
});

export const FailedEventSchema = z.object({
  event_data: CandidateEventSchema,
  error: z.string().min(1),
});

export const EventCreationResponseSchema = z.object({
  success: z.boolean(),
  message: z.string().optional(),
  events_created: z.number().int().min(0),
  events_failed: z.number().int().min(0),
  created_events: z.array(z.unknown()),
  failed_events: z.array(FailedEventSchema),
  error: z.string().optional(),
});

export const ScheduleParseResponseSchema = z.object({
  success: z.boolean(),
  message: z.string().optional(),
  events: z.array(z.unknown()).default([]),
  error: z.string().optional(),
});

export const AttendancePatternsResponseSchema = z.object({
  success: z.boolean(),
  message: z.string().optional(),
  patterns: z.record(z.unknown()).default({}),
  error: z.string().optional(),
});

/**
 * Vision service response body
 */
export const VisionResponseSchema = z.object({
  events: z.array(CandidateEventSchema),
  confidence: z.number().min(0).max(1),
});

/**
 * Generic service health body
 */
export const HealthResponseSchema = z.object({
  status: z.string(),
  service: z.string(),
});
