/**
 * S3 status reporter
 * @module @kuberoute/server/status/s3-reporter
 */

import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import {
  StatusReportError,
  createServiceLogger,
  errorMessage,
  type Logger,
  type StatusConfig,
  type StatusReport,
  type StatusReporter,
} from '@kuberoute/shared';

/**
 * Object store the reporter writes to
 */
export interface ObjectWriter {
  putObject(object: { bucket: string; key: string; body: string; contentType: string }): Promise<void>;
}

/**
 * ObjectWriter over the AWS SDK client
 */
export function createObjectWriter(client: Pick<S3Client, 'send'>): ObjectWriter {
  return {
    async putObject({ bucket, key, body, contentType }) {
      await client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
          CacheControl: 'no-cache',
        }),
      );
    },
  };
}

/**
 * Serialize a report the way it is published
 */
export function serializeStatusReport(report: StatusReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

/**
 * Writes the status document as JSON to one S3 object
 */
export class S3StatusReporter implements StatusReporter {
  private readonly logger: Logger;

  constructor(
    private readonly writer: ObjectWriter,
    private readonly config: StatusConfig,
    logger?: Logger,
  ) {
    this.logger = logger ?? createServiceLogger({ level: 'info' }, { component: 's3-reporter' });
  }

  async write(report: StatusReport): Promise<void> {
    try {
      await this.writer.putObject({
        bucket: this.config.bucket,
        key: this.config.key,
        body: serializeStatusReport(report),
        contentType: 'application/json',
      });
      this.logger.debug('Status report written', {
        bucket: this.config.bucket,
        key: this.config.key,
        available: report.available,
        records: report.records.length,
      });
    } catch (error) {
      throw new StatusReportError(
        `Failed to write s3://${this.config.bucket}/${this.config.key}: ${errorMessage(error)}`,
        { bucket: this.config.bucket, key: this.config.key },
        error instanceof Error ? error : undefined,
      );
    }
  }
}

/**
 * Create an S3 reporter from configuration
 */
export function createS3Reporter(config: StatusConfig, timeoutMs: number, logger?: Logger): S3StatusReporter {
  const client = new S3Client({
    ...(config.region && { region: config.region }),
    requestHandler: { requestTimeout: timeoutMs },
  });
  return new S3StatusReporter(createObjectWriter(client), config, logger);
}
