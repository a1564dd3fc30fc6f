/**
 * Unit tests for the S3 status reporter
 * @module @kuberoute/server/tests/unit/s3-reporter
 */

import { describe, it, expect, vi } from 'vitest';
import { PutObjectCommand } from '@aws-sdk/client-s3';
import { ErrorCode, StatusReportError, type StatusReport } from '@kuberoute/shared';
import {
  S3StatusReporter,
  createObjectWriter,
  serializeStatusReport,
  type ObjectWriter,
} from '../../src/status/s3-reporter.js';

const report: StatusReport = {
  available: true,
  generatedAt: '2024-05-01T10:07:00.000Z',
  observedAt: '2024-05-01T10:07:00.000Z',
  records: [],
  nodes: [{ name: 'n1', address: '10.0.0.1', ready: true }],
};

describe('S3StatusReporter', () => {
  it('writes the report as JSON to the configured object', async () => {
    const putObject = vi.fn<ObjectWriter['putObject']>().mockResolvedValue(undefined);
    const reporter = new S3StatusReporter({ putObject }, { bucket: 'kuberoute-status', key: 'prod/status.json' });

    await reporter.write(report);

    expect(putObject).toHaveBeenCalledWith({
      bucket: 'kuberoute-status',
      key: 'prod/status.json',
      body: serializeStatusReport(report),
      contentType: 'application/json',
    });
    expect(JSON.parse(serializeStatusReport(report))).toEqual(report);
  });

  it('raises a StatusReportError when the write fails', async () => {
    const putObject = vi.fn<ObjectWriter['putObject']>().mockRejectedValue(new Error('AccessDenied'));
    const reporter = new S3StatusReporter({ putObject }, { bucket: 'kuberoute-status', key: 'status.json' });

    const error = await reporter.write(report).catch((thrown: unknown) => thrown);

    expect(error).toBeInstanceOf(StatusReportError);
    if (error instanceof StatusReportError) {
      expect(error.code).toBe(ErrorCode.STATUS_REPORT_FAILED);
      expect(error.message).toBe('Failed to write s3://kuberoute-status/status.json: AccessDenied');
    }
  });
});

describe('createObjectWriter', () => {
  it('sends a PutObjectCommand', async () => {
    const send = vi.fn().mockResolvedValue({});
    const writer = createObjectWriter({ send });

    await writer.putObject({ bucket: 'b', key: 'k', body: '{}', contentType: 'application/json' });

    const command = send.mock.calls[0]?.[0];
    expect(command).toBeInstanceOf(PutObjectCommand);
    if (command instanceof PutObjectCommand) {
      expect(command.input).toMatchObject({ Bucket: 'b', Key: 'k', Body: '{}', ContentType: 'application/json' });
    }
  });
});
