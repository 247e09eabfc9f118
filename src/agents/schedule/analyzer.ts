/**
 * Schedule image analysis
 * The vision model lives in another service; this module only talks to it
 */

import { VisionResponseSchema } from '../../api/schemas.js';
import type { CandidateEvent } from '../../api/types.js';
import type { DelegationClient, DelegationErrorKind } from '../../delegation/client.js';

/**
 * Decoded schedule image
 */
export interface ScheduleImage {
  teamId: number;
  fileName: string;
  mimeType: string;
  content: Buffer;
}

/**
 * Analyzer outcome
 */
export type ImageAnalysis =
  | { success: true; events: CandidateEvent[]; confidence: number }
  | { success: false; error: string; kind: DelegationErrorKind };

/**
 * Extracts candidate events from a schedule image
 */
export interface ScheduleImageAnalyzer {
  analyze(image: ScheduleImage): Promise<ImageAnalysis>;
}

/**
 * Analyzer backed by an HTTP vision endpoint
 */
export class HttpScheduleImageAnalyzer implements ScheduleImageAnalyzer {
  constructor(
    private readonly client: DelegationClient,
    private readonly endpoint: string
  ) {}

  async analyze(image: ScheduleImage): Promise<ImageAnalysis> {
    const result = await this.client.postJson(
      this.endpoint,
      {
        team_id: image.teamId,
        file_name: image.fileName,
        mime_type: image.mimeType,
        image_base64: image.content.toString('base64'),
      },
      { schema: VisionResponseSchema }
    );

    if (!result.success) {
      return { success: false, error: result.error, kind: result.kind };
    }

    return {
      success: true,
      events: result.data.events,
      confidence: result.data.confidence,
    };
  }
}
