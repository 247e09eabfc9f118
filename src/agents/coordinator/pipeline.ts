/**
 * Schedule image pipeline
 * Drives analyze -> create -> assemble against the schedule agent for one upload
 */

import type pino from 'pino';
import {
  EventCreationResponseSchema,
  ImageAnalysisResponseSchema,
} from '../../api/schemas.js';
import type {
  CandidateEvent,
  ErrorKind,
  OrchestrationResult,
  PipelineState,
  UploadedFile,
} from '../../api/types.js';
import type { DelegationClient, DelegationResult } from '../../delegation/client.js';
import { formatTimestamp } from '../../utils/index.js';

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  RECEIVED: ['ANALYZING'],
  ANALYZING: ['CREATING', 'DONE', 'FAILED'],
  CREATING: ['ASSEMBLING', 'FAILED'],
  ASSEMBLING: ['DONE'],
  DONE: [],
  FAILED: [],
};

/**
 * A failed step, whether the call broke or the agent said no
 */
interface StepFailure {
  error: string;
  kind: ErrorKind;
}

/**
 * Collapse a delegated call into its payload or a single failure
 */
function unwrapStep<T extends { success: boolean; error?: string; message?: string; error_kind?: ErrorKind }>(
  result: DelegationResult<T>
): { ok: true; data: T } | { ok: false; failure: StepFailure } {
  if (!result.success) {
    return { ok: false, failure: { error: result.error, kind: result.kind } };
  }
  if (!result.data.success) {
    return {
      ok: false,
      failure: {
        error: result.data.error ?? result.data.message ?? 'Upstream reported failure',
        kind: result.data.error_kind ?? 'upstream_application',
      },
    };
  }
  return { ok: true, data: result.data };
}

export interface PipelineOptions {
  client: DelegationClient;
  scheduleServiceUrl: string;
  logger: pino.Logger;
  now?: () => Date;
}

export class ScheduleImagePipeline {
  private current: PipelineState = 'RECEIVED';
  private readonly history: PipelineState[] = ['RECEIVED'];
  private readonly client: DelegationClient;
  private readonly scheduleServiceUrl: string;
  private readonly logger: pino.Logger;
  private readonly now: () => Date;

  constructor(options: PipelineOptions) {
    this.client = options.client;
    this.scheduleServiceUrl = options.scheduleServiceUrl;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  get state(): PipelineState {
    return this.current;
  }

  /**
   * States visited so far, in order
   */
  get states(): readonly PipelineState[] {
    return this.history;
  }

  async run(file: UploadedFile): Promise<OrchestrationResult> {
    const teamId = file.team_id;

    this.transition('ANALYZING');
    const analysis = unwrapStep(
      await this.client.invokeTool(this.scheduleServiceUrl, 'analyze_schedule_image', file, {
        schema: ImageAnalysisResponseSchema,
      })
    );

    if (!analysis.ok) {
      return this.fail(teamId, 'Schedule analysis failed', analysis.failure, []);
    }

    const events = analysis.data.events;
    const confidence = analysis.data.confidence;

    if (events.length === 0) {
      this.transition('DONE');
      return {
        ...this.emptyResult(teamId),
        success: true,
        message: 'No events found in schedule image',
        state: 'DONE',
        confidence,
      };
    }

    this.transition('CREATING');
    const creation = unwrapStep(
      await this.client.invokeTool(
        this.scheduleServiceUrl,
        'create_schedule_events',
        { team_id: teamId, events },
        { schema: EventCreationResponseSchema }
      )
    );

    if (!creation.ok) {
      return this.fail(teamId, 'Event creation failed', creation.failure, events, confidence);
    }

    this.transition('ASSEMBLING');
    const created = creation.data;
    const result: OrchestrationResult = {
      success: true,
      message: `Created ${created.events_created} of ${events.length} events from ${file.file_name}`,
      state: 'DONE',
      team_id: teamId,
      events_found: events.length,
      events_created: created.events_created,
      events_failed: created.events_failed,
      parsed_events: events,
      created_events: created.created_events,
      failed_events: created.failed_events,
      confidence,
      completed_at: formatTimestamp(this.now()),
    };

    this.transition('DONE');
    return result;
  }

  private fail(
    teamId: number,
    message: string,
    failure: StepFailure,
    parsedEvents: CandidateEvent[],
    confidence?: number
  ): OrchestrationResult {
    const failedIn = this.current;
    this.transition('FAILED');
    this.logger.warn({ teamId, failedIn, kind: failure.kind, error: failure.error }, message);

    return {
      ...this.emptyResult(teamId),
      success: false,
      message,
      state: 'FAILED',
      events_found: parsedEvents.length,
      parsed_events: parsedEvents,
      confidence,
      error: failure.error,
      error_kind: failure.kind,
    };
  }

  private emptyResult(teamId: number): Omit<OrchestrationResult, 'success' | 'message' | 'state'> {
    return {
      team_id: teamId,
      events_found: 0,
      events_created: 0,
      events_failed: 0,
      parsed_events: [],
      created_events: [],
      failed_events: [],
      completed_at: formatTimestamp(this.now()),
    };
  }

  private transition(next: PipelineState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid pipeline transition: ${this.current} -> ${next}`);
    }
    this.logger.debug({ from: this.current, to: next }, 'Pipeline transition');
    this.current = next;
    this.history.push(next);
  }
}
