import path from 'node:path';
import fs from 'fs-extra';
import type { MediaItem } from '../types/migration.js';
import type { RunSummary } from '../types/pipeline.js';

export class ReportService {
  constructor(private readonly reportDir: string) {}

  /** Writes `run-<timestamp>.json` and a matching CSV of every media item; returns the JSON path. */
  async create(summary: RunSummary, items: MediaItem[]): Promise<string> {
    await fs.ensureDir(this.reportDir);
    const timestamp = summary.finishedAt.replace(/[:.]/g, '-');
    const jsonPath = path.join(this.reportDir, `run-${timestamp}.json`);
    const csvPath = path.join(this.reportDir, `run-${timestamp}.csv`);

    await fs.writeJson(jsonPath, { ...summary, reportPath: jsonPath }, { spaces: 2 });
    await fs.writeFile(csvPath, this.buildCsv(items));

    return jsonPath;
  }

  buildCsv(items: MediaItem[]): string {
    const header = ['id', 'archiveId', 'relativePath', 'phase', 'albums', 'attempts', 'remoteId', 'errorKind', 'error'];
    const rows = items.map((item) => [
      item.id,
      item.archiveId,
      item.relativePath,
      item.phase,
      item.albums.join(' | '),
      item.attempts,
      item.remoteId ?? '',
      item.lastError?.kind ?? '',
      item.lastError?.message ?? ''
    ]);
    return [header, ...rows]
      .map((cols) =>
        cols
          .map((value) => {
            if (typeof value === 'string') {
              const escaped = value.replace(/"/g, '""');
              return `"${escaped}"`;
            }
            return value;
          })
          .join(',')
      )
      .join('\n');
  }
}
