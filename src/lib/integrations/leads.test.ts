import { describe, expect, it } from 'vitest';
import { loadConfig } from '../config';
import { GoogleSheetsLeadSink, LeadSink, captureLead, leadRow } from './leads';

const LEAD = { email: 'visitor@example.com', url: 'https://example.com/', capturedAt: new Date('2026-03-01T10:00:00.000Z') };

describe('leadRow', () => {
  it('orders columns as email, url, timestamp', () => {
    expect(leadRow(LEAD)).toEqual(['visitor@example.com', 'https://example.com/', '2026-03-01T10:00:00.000Z']);
  });
});

describe('captureLead', () => {
  it('reports success from the sink', async () => {
    const rows: string[][] = [];
    const sink: LeadSink = {
      async append(lead) {
        rows.push(leadRow(lead));
      },
    };
    expect(await captureLead(sink, LEAD)).toBe(true);
    expect(rows).toHaveLength(1);
  });

  it('swallows an unconfigured sink and returns false', async () => {
    expect(await captureLead(new GoogleSheetsLeadSink(loadConfig({})), LEAD)).toBe(false);
  });
});
