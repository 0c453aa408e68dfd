// src/exporters/Exporter.ts

import { promises as fs } from 'fs';
import * as path from 'path';
import type { CanonicalAdRecord } from '../core/normalizer/types';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import { SERIALIZERS, isExportFormat } from './serializers';
import type { ExportFormat } from './serializers';
import { ExportError, UnsupportedExportFormatError } from '../utils/errors';
import { withExportSpan } from '../observability/tracing';

export class Exporter {
  constructor(
    private logger: Logger,
    private metrics: MetricsCollector
  ) {}

  /**
   * Resolve a user-supplied format token (case-insensitive).
   *
   * @throws {UnsupportedExportFormatError} If the token is not json, csv or xml
   */
  static resolveFormat(format: string): ExportFormat {
    const normalized = format.trim().toLowerCase();
    if (!isExportFormat(normalized)) {
      throw new UnsupportedExportFormatError(format);
    }
    return normalized;
  }

  /**
   * Write records to destination in the given format.
   *
   * The format is checked before touching the filesystem. Content goes to a
   * temporary sibling file that is then renamed over the destination, so the
   * destination is either fully written or left as it was.
   *
   * @throws {UnsupportedExportFormatError} If the format is not supported
   * @throws {ExportError} If the file cannot be written
   */
  async export(
    records: readonly CanonicalAdRecord[],
    format: string,
    destination: string
  ): Promise<void> {
    const resolved = Exporter.resolveFormat(format);
    const target = path.resolve(destination);

    await withExportSpan(resolved, target, async () => {
      const startTime = Date.now();
      this.logger.debug('Exporting ads', { count: records.length, destination: target, format: resolved });

      if (resolved === 'csv' && records.length === 0) {
        this.logger.warn('No ads to export to CSV', { destination: target });
      }

      const content = SERIALIZERS[resolved](records);
      await this.writeAtomically(target, content);

      this.metrics.incrementCounter('records_exported', { format: resolved }, records.length);
      this.metrics.recordLatency('export_duration', Date.now() - startTime, { format: resolved });
    });
  }

  private async writeAtomically(target: string, content: string): Promise<void> {
    const tempFile = path.join(
      path.dirname(target),
      `.${path.basename(target)}.${process.pid}.${Date.now()}.tmp`
    );

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(tempFile, content, 'utf-8');
      await fs.rename(tempFile, target);
    } catch (error: unknown) {
      await fs.rm(tempFile, { force: true }).catch(() => undefined);
      throw new ExportError(`Failed to write ${target}`, {
        destination: target,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
