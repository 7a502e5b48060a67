import { describe, it, expect } from 'vitest';
import { buildMediaParts, inferMimeType } from './media-analysis-client.js';
import { createMockMediaAnalysisClient } from './mock-media-analysis-client.js';

describe('inferMimeType', () => {
  it('should map known extensions', () => {
    expect(inferMimeType('gs://bucket/talk.MP4')).toBe('video/mp4');
    expect(inferMimeType('https://cdn.example/chart.png?size=large')).toBe('image/png');
  });

  it('should leave hosted video pages untyped', () => {
    expect(inferMimeType('https://www.youtube.com/watch?v=abc123')).toBeUndefined();
  });
});

describe('buildMediaParts', () => {
  it('should place every media reference before the prompt', () => {
    const parts = buildMediaParts({
      prompt: 'Describe the chart',
      mediaUris: ['gs://bucket/chart.png', 'https://www.youtube.com/watch?v=abc123'],
    });

    expect(parts).toEqual([
      { fileData: { fileUri: 'gs://bucket/chart.png', mimeType: 'image/png' } },
      { fileData: { fileUri: 'https://www.youtube.com/watch?v=abc123' } },
      { text: 'Describe the chart' },
    ]);
  });
});

describe('MockMediaAnalysisClient', () => {
  it('should report the analysed media as sources', async () => {
    const result = await createMockMediaAnalysisClient().analyze({
      prompt: 'Summarize',
      mediaUris: ['gs://bucket/a.mp4'],
    });

    expect(result).toEqual({
      content: 'Mock analysis of 1 media item(s).',
      sourceUrls: ['gs://bucket/a.mp4'],
    });
  });
});
