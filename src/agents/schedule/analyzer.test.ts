/**
 * Vision analyzer tests
 */

import { describe, it, expect, vi } from 'vitest';
import { HttpScheduleImageAnalyzer } from './analyzer.js';
import { DelegationClient } from '../../delegation/client.js';

const image = {
  teamId: 5,
  fileName: 'spring.png',
  mimeType: 'image/png',
  content: Buffer.from('png-bytes'),
};

describe('HttpScheduleImageAnalyzer', () => {
  it('should send the image as base64 and return the events', async () => {
    const fetchMock = vi.fn().mockResolvedValueOnce({
      status: 200,
      text: async () => JSON.stringify({
        events: [
          { title: 'Practice', date: '2026-04-02', time: '17:30', location: 'Field 3', type: 'practice' },
        ],
        confidence: 0.91,
      }),
    });
    const analyzer = new HttpScheduleImageAnalyzer(
      new DelegationClient({ timeoutMs: 1000, fetch: fetchMock }),
      'http://vision-service:8000/analyze'
    );

    const result = await analyzer.analyze(image);

    expect(result).toEqual({
      success: true,
      events: [
        { title: 'Practice', date: '2026-04-02', time: '17:30', location: 'Field 3', type: 'practice' },
      ],
      confidence: 0.91,
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://vision-service:8000/analyze');
    expect(JSON.parse(init.body)).toEqual({
      team_id: 5,
      file_name: 'spring.png',
      mime_type: 'image/png',
      image_base64: Buffer.from('png-bytes').toString('base64'),
    });
  });

  it('should pass upstream failures through', async () => {
    const fetchMock = vi.fn().mockResolvedValueOnce({
      status: 503,
      text: async () => 'model loading',
    });
    const analyzer = new HttpScheduleImageAnalyzer(
      new DelegationClient({ timeoutMs: 1000, fetch: fetchMock }),
      'http://vision-service:8000/analyze'
    );

    const result = await analyzer.analyze(image);

    expect(result).toEqual({
      success: false,
      error: 'HTTP 503: model loading',
      kind: 'upstream_application',
    });
  });
});
