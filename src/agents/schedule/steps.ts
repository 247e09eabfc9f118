/**
 * Schedule pipeline steps
 * Image analysis and best-effort event creation
 */

import type pino from 'pino';
import type {
  EventCreationRequest,
  EventCreationResult,
  FailedEvent,
  ImageAnalysisResult,
  UploadedFile,
} from '../../api/types.js';
import type { DelegationClient } from '../../delegation/client.js';
import type { ScheduleImageAnalyzer } from './analyzer.js';
import { decodeUploadedFile } from './decode.js';

/**
 * Statuses the event store answers on a created event
 */
export const EVENT_STORE_ACCEPT = [200, 201] as const;

/**
 * Decode an uploaded schedule image and hand it to the analyzer
 * Fails before any downstream call when the upload cannot be decoded
 */
export async function analyzeScheduleImage(
  file: UploadedFile,
  analyzer: ScheduleImageAnalyzer,
  logger: pino.Logger
): Promise<ImageAnalysisResult> {
  const base = {
    events: [],
    confidence: 0,
    file_name: file.file_name,
    team_id: file.team_id,
  };

  const decoded = decodeUploadedFile(file);
  if (!decoded.success) {
    logger.warn({ fileName: file.file_name, error: decoded.error }, 'Rejected upload');
    return {
      ...base,
      success: false,
      message: 'Schedule image analysis failed',
      error: decoded.error,
      error_kind: 'decode',
    };
  }

  // Decode errors take precedence over the type check
  if (!file.mime_type.startsWith('image/')) {
    return {
      ...base,
      success: false,
      message: 'Schedule image analysis failed',
      error: `Unsupported file type: ${file.mime_type}`,
      error_kind: 'validation',
    };
  }

  logger.info({ fileName: file.file_name, bytes: decoded.content.length }, 'Analyzing schedule image');

  const analysis = await analyzer.analyze({
    teamId: file.team_id,
    fileName: file.file_name,
    mimeType: file.mime_type,
    content: decoded.content,
  });

  if (!analysis.success) {
    return {
      ...base,
      success: false,
      message: 'Schedule image analysis failed',
      error: analysis.error,
      error_kind: analysis.kind,
    };
  }

  return {
    ...base,
    success: true,
    message: `Found ${analysis.events.length} events in ${file.file_name}`,
    events: analysis.events,
    confidence: analysis.confidence,
  };
}

/**
 * Store each event in turn, collecting per-event failures
 * One failed event never stops the rest
 */
export async function createScheduleEvents(
  request: EventCreationRequest,
  client: DelegationClient,
  eventStoreUrl: string,
  logger: pino.Logger
): Promise<EventCreationResult> {
  const createdEvents: unknown[] = [];
  const failedEvents: FailedEvent[] = [];

  if (request.events.length === 0) {
    return {
      success: true,
      message: 'No events to create',
      team_id: request.team_id,
      events_created: 0,
      events_failed: 0,
      created_events: createdEvents,
      failed_events: failedEvents,
    };
  }

  for (const event of request.events) {
    const result = await client.postJson(
      eventStoreUrl,
      { ...event, team_id: request.team_id },
      { acceptStatuses: EVENT_STORE_ACCEPT }
    );

    if (result.success) {
      createdEvents.push(result.data);
    } else {
      logger.warn({ title: event.title, date: event.date, error: result.error }, 'Event creation failed');
      failedEvents.push({ event_data: event, error: result.error });
    }
  }

  logger.info(
    { teamId: request.team_id, created: createdEvents.length, failed: failedEvents.length },
    'Event creation finished'
  );

  return {
    success: true,
    message: `Created ${createdEvents.length} of ${request.events.length} events`,
    team_id: request.team_id,
    events_created: createdEvents.length,
    events_failed: failedEvents.length,
    created_events: createdEvents,
    failed_events: failedEvents,
  };
}
