import path from 'node:path';
import fs from 'fs-extra';
import archiver from 'archiver';

export interface DiagnosticsRequest {
  destinationDir: string;
  logsDir: string;
  stateDir: string;
  reportPath?: string;
  configPath?: string;
}

/** Zips state, the latest report and logs into one file for troubleshooting. */
export class DiagnosticsService {
  async createBundle(request: DiagnosticsRequest): Promise<string> {
    await fs.ensureDir(request.destinationDir);
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const archivePath = path.join(request.destinationDir, `diagnostics-${timestamp}.zip`);
    await this.writeArchive(archivePath, request);
    return archivePath;
  }

  private async writeArchive(archivePath: string, request: DiagnosticsRequest): Promise<void> {
    const output = fs.createWriteStream(archivePath);
    const archive = archiver('zip', { zlib: { level: 9 } });
    const finalizePromise = new Promise<void>((resolve, reject) => {
      output.on('close', () => resolve());
      archive.on('error', (error: Error) => reject(error));
    });
    archive.pipe(output);

    if (request.reportPath && (await fs.pathExists(request.reportPath))) {
      archive.file(request.reportPath, { name: path.basename(request.reportPath) });
    }

    for (const name of ['state.json', 'state.journal']) {
      const statePath = path.join(request.stateDir, name);
      if (await fs.pathExists(statePath)) {
        archive.file(statePath, { name: `state/${name}` });
      }
    }

    if (request.configPath && (await fs.pathExists(request.configPath))) {
      archive.file(request.configPath, { name: path.basename(request.configPath) });
    }

    if (await fs.pathExists(request.logsDir)) {
      archive.directory(request.logsDir, 'logs');
    }

    await archive.finalize();
    await finalizePromise;
  }
}
