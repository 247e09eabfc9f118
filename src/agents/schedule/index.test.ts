/**
 * Schedule agent tests
 */

import { describe, it, expect, vi } from 'vitest';
import { scheduleService } from './index.js';
import { DelegationClient } from '../../delegation/client.js';
import { silentLogger } from '../../utils/logger.js';

const context = { requestId: 'req_test', logger: silentLogger() };

describe('scheduleService', () => {
  const analyzer = { analyze: vi.fn() };
  const fetchMock = vi.fn();
  const tools = scheduleService.createTools({
    client: new DelegationClient({ timeoutMs: 1000, fetch: fetchMock }),
    analyzer,
    eventStoreUrl: 'http://event-store:8080/api/events',
  });

  it('should expose the schedule tools', () => {
    expect(tools.list().map((tool) => tool.name)).toEqual([
      'parse_schedule',
      'update_schedule_event',
      'get_schedule_events',
      'analyze_schedule_image',
      'create_schedule_events',
    ]);
  });

  it('should echo the requested format when parsing', async () => {
    const outcome = await tools.execute('parse_schedule', { schedule_content: 'a,b', format: 'csv' }, context);

    expect(outcome).toEqual({
      status: 'ok',
      result: {
        success: true,
        message: 'Schedule parsed successfully',
        events: [],
        total_events: 0,
        format_detected: 'csv',
      },
    });
  });

  it('should acknowledge an event update', async () => {
    const outcome = await tools.execute('update_schedule_event', {
      event_id: 'evt_3',
      title: 'Practice',
      date: '2026-04-02',
      time: '18:00',
      location: 'Field 1',
      team_id: '5',
    }, context);

    expect(outcome).toEqual({
      status: 'ok',
      result: {
        success: true,
        message: 'Event updated successfully',
        event_id: 'evt_3',
        team_id: '5',
      },
    });
  });

  it('should return no events with a null date range by default', async () => {
    const outcome = await tools.execute('get_schedule_events', { team_id: '5' }, context);

    expect(outcome).toEqual({
      status: 'ok',
      result: {
        success: true,
        message: 'Events retrieved successfully',
        events: [],
        team_id: '5',
        date_range: null,
        total_events: 0,
      },
    });
  });

  it('should short-circuit an empty creation batch', async () => {
    const outcome = await tools.execute('create_schedule_events', { team_id: 5, events: [] }, context);

    expect(outcome.status).toBe('ok');
    if (outcome.status === 'ok') {
      expect(outcome.result).toMatchObject({
        events_created: 0,
        events_failed: 0,
        created_events: [],
        failed_events: [],
      });
    }
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
