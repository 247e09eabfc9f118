/**
 * API schemas tests
 */

import { describe, it, expect } from 'vitest';
import {
  CandidateEventSchema,
  UploadedFileSchema,
  EventCreationRequestSchema,
  ScheduleParseRequestSchema,
  AttendanceRecordSchema,
  ReminderSchema,
  ImageAnalysisResponseSchema,
  EventCreationResponseSchema,
  VisionResponseSchema,
  ErrorKindSchema,
} from './schemas.js';

const game = {
  title: 'League game',
  date: '2026-04-11',
  time: '10:00',
  location: 'Main Stadium',
  type: 'game',
  opponent: 'Riverside Otters',
};

describe('ScheduleSchemas', () => {
  describe('CandidateEventSchema', () => {
    it('should validate a game with an opponent', () => {
      const result = CandidateEventSchema.safeParse(game);
      expect(result.success).toBe(true);
    });

    it('should reject an unknown event type', () => {
      const result = CandidateEventSchema.safeParse({ ...game, type: 'tournament' });
      expect(result.success).toBe(false);
    });

    it('should reject an empty title', () => {
      const result = CandidateEventSchema.safeParse({ ...game, title: '' });
      expect(result.success).toBe(false);
    });
  });

  describe('UploadedFileSchema', () => {
    const upload = {
      team_id: 5,
      file_content: 'aGk=',
      file_name: 'week1.png',
      file_size: 2,
      mime_type: 'image/png',
      uploaded_at: '2026-03-01T12:00:00Z',
    };

    it('should validate a complete upload', () => {
      expect(UploadedFileSchema.safeParse(upload).success).toBe(true);
    });

    it('should require an integer team id', () => {
      expect(UploadedFileSchema.safeParse({ ...upload, team_id: '5' }).success).toBe(false);
      expect(UploadedFileSchema.safeParse({ ...upload, team_id: 5.5 }).success).toBe(false);
    });

    it('should accept empty content so decoding can report it', () => {
      expect(UploadedFileSchema.safeParse({ ...upload, file_content: '' }).success).toBe(true);
    });

    it('should reject a zero or negative size', () => {
      expect(UploadedFileSchema.safeParse({ ...upload, file_size: -1 }).success).toBe(false);
      expect(UploadedFileSchema.safeParse({ ...upload, file_content: '', file_size: 0 }).success).toBe(false);
    });
  });

  describe('EventCreationRequestSchema', () => {
    it('should accept an empty event list', () => {
      const result = EventCreationRequestSchema.safeParse({ team_id: 5, events: [] });
      expect(result.success).toBe(true);
    });
  });

  describe('ScheduleParseRequestSchema', () => {
    it('should default format to auto', () => {
      const result = ScheduleParseRequestSchema.parse({ schedule_content: 'x' });
      expect(result.format).toBe('auto');
    });
  });
});

describe('AttendanceSchemas', () => {
  it('should accept the three attendance statuses', () => {
    for (const status of ['present', 'absent', 'late']) {
      const result = AttendanceRecordSchema.safeParse({
        player_id: 'p1',
        event_id: 'evt_1',
        status,
        timestamp: '2026-04-02T17:35:00Z',
        team_id: '5',
      });
      expect(result.success).toBe(true);
    }
  });

  it('should reject a reminder without a message', () => {
    const result = ReminderSchema.safeParse({ message: '', recipients: [], team_id: '5' });
    expect(result.success).toBe(false);
  });
});

describe('ResponseSchemas', () => {
  it('should fill defaults on a failed analysis body', () => {
    const result = ImageAnalysisResponseSchema.parse({
      success: false,
      error: 'DecodeError: file_content is empty',
      error_kind: 'decode',
    });

    expect(result).toEqual({
      success: false,
      events: [],
      confidence: 0,
      error: 'DecodeError: file_content is empty',
      error_kind: 'decode',
    });
  });

  it('should reject confidence outside 0..1', () => {
    expect(VisionResponseSchema.safeParse({ events: [], confidence: 1.2 }).success).toBe(false);
  });

  it('should require counts on a creation body', () => {
    const result = EventCreationResponseSchema.safeParse({
      success: true,
      created_events: [],
      failed_events: [],
    });
    expect(result.success).toBe(false);
  });

  it('should list the error kinds', () => {
    expect(ErrorKindSchema.options).toEqual([
      'decode',
      'validation',
      'upstream_transport',
      'upstream_application',
    ]);
  });
});
