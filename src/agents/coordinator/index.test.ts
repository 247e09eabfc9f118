/**
 * Team captain agent tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { coordinatorService } from './index.js';
import { DelegationClient } from '../../delegation/client.js';
import { silentLogger } from '../../utils/logger.js';
import type { ToolRegistry } from '../../tools/registry.js';

const context = { requestId: 'req_test', logger: silentLogger() };

function jsonResponse(status: number, body: unknown) {
  return { status, text: async () => JSON.stringify(body) };
}

describe('coordinatorService', () => {
  let fetchMock: ReturnType<typeof vi.fn>;
  let tools: ToolRegistry;

  beforeEach(() => {
    fetchMock = vi.fn();
    tools = coordinatorService.createTools({
      client: new DelegationClient({ timeoutMs: 1000, fetch: fetchMock }),
      scheduleServiceUrl: 'http://schedule-agent:8000',
      attendanceServiceUrl: 'http://attendance-agent:8000',
    });
  });

  it('should expose the coordinator tools', () => {
    expect(tools.list().map((tool) => tool.name)).toEqual([
      'process_schedule_image',
      'upload_schedule',
      'send_reminder',
      'analyze_attendance',
    ]);
  });

  it('should acknowledge a reminder without calling anyone', async () => {
    const outcome = await tools.execute('send_reminder', {
      message: 'Bring water',
      recipients: ['p1', 'p2'],
      team_id: '5',
    }, context);

    expect(outcome).toEqual({
      status: 'ok',
      result: {
        success: true,
        message: 'Reminder sent successfully',
        recipients: ['p1', 'p2'],
        team_id: '5',
      },
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should default the upload format to auto', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(200, { success: true, events: [{ title: 'x' }] }));

    const outcome = await tools.execute('upload_schedule', { schedule_content: 'csv', team_id: '5' }, context);

    expect(JSON.parse(fetchMock.mock.calls[0][1].body)).toEqual({ schedule_content: 'csv', format: 'auto' });
    expect(outcome).toEqual({
      status: 'ok',
      result: {
        success: true,
        message: 'Schedule uploaded successfully',
        parsed_events: [{ title: 'x' }],
        team_id: '5',
      },
    });
  });

  it('should report an upload that the schedule agent could not take', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(503, { detail: 'busy' }));

    const outcome = await tools.execute('upload_schedule', { schedule_content: 'csv', team_id: '5' }, context);

    expect(outcome).toEqual({
      status: 'ok',
      result: {
        success: false,
        message: 'Schedule upload failed',
        parsed_events: [],
        team_id: '5',
        error: 'HTTP 503: {"detail":"busy"}',
      },
    });
  });

  it('should report attendance analysis refused by the attendance agent', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(200, { success: false, error: 'no records' }));

    const outcome = await tools.execute('analyze_attendance', { team_id: '5', attendance_records: [] }, context);

    expect(fetchMock.mock.calls[0][0]).toBe('http://attendance-agent:8000/tools/analyze_attendance_patterns');
    expect(JSON.parse(fetchMock.mock.calls[0][1].body)).toEqual({ team_id: '5' });
    expect(outcome).toEqual({
      status: 'ok',
      result: {
        success: false,
        message: 'Attendance analysis failed',
        patterns: {},
        team_id: '5',
        error: 'no records',
      },
    });
  });

  it('should pass the players named in the records to the attendance agent', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(200, { success: true, patterns: { total_events: 2 } }));

    const outcome = await tools.execute('analyze_attendance', {
      team_id: '5',
      attendance_records: [
        { player_id: 'p1', event_id: 'evt_1', status: 'present' },
        { player_id: 'p2', event_id: 'evt_1', status: 'late' },
        { player_id: 'p1', event_id: 'evt_2', status: 'absent' },
        { event_id: 'evt_2', status: 'present' },
      ],
    }, context);

    expect(JSON.parse(fetchMock.mock.calls[0][1].body)).toEqual({ team_id: '5', player_ids: ['p1', 'p2'] });
    expect(outcome).toEqual({
      status: 'ok',
      result: {
        success: true,
        message: 'Attendance analysis completed',
        patterns: { total_events: 2 },
        team_id: '5',
      },
    });
  });

  it('should require the attendance records', async () => {
    const outcome = await tools.execute('analyze_attendance', { team_id: '5' }, context);

    expect(outcome.status).toBe('invalid_input');
    if (outcome.status === 'invalid_input') {
      expect(outcome.error).toBe('attendance_records: Required');
    }
  });

  it('should reject an upload with a negative file size', async () => {
    const outcome = await tools.execute('process_schedule_image', {
      team_id: 5,
      file_content: 'aGk=',
      file_name: 'a.png',
      file_size: -1,
      mime_type: 'image/png',
      uploaded_at: '2026-03-01T12:00:00Z',
    }, context);

    expect(outcome.status).toBe('invalid_input');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should treat an empty file as invalid input rather than a decode failure', async () => {
    const outcome = await tools.execute('process_schedule_image', {
      team_id: 5,
      file_content: '',
      file_name: 'empty.png',
      file_size: 0,
      mime_type: 'image/png',
      uploaded_at: '2026-03-01T12:00:00Z',
    }, context);

    expect(outcome.status).toBe('invalid_input');
    if (outcome.status === 'invalid_input') {
      expect(outcome.error).toBe('file_size: Number must be greater than or equal to 1');
    }
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
