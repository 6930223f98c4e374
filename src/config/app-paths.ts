import path from 'node:path';
import fs from 'fs-extra';

export interface AppPaths {
  baseDir: string;
  zipsDir: string;
  extractedDir: string;
  stateDir: string;
  reportDir: string;
  logDir: string;
  logFile: string;
}

export const getAppPaths = (baseDir: string): AppPaths => {
  const root = path.resolve(baseDir);
  const logDir = path.join(root, 'logs');
  return {
    baseDir: root,
    zipsDir: path.join(root, 'zips'),
    extractedDir: path.join(root, 'extracted'),
    stateDir: path.join(root, 'state'),
    reportDir: path.join(root, 'reports'),
    logDir,
    logFile: path.join(logDir, 'migration.log')
  };
};

export const ensureAppDirectories = async (paths: AppPaths): Promise<void> => {
  await fs.ensureDir(paths.baseDir);
  await fs.ensureDir(paths.zipsDir);
  await fs.ensureDir(paths.extractedDir);
  await fs.ensureDir(paths.stateDir);
  await fs.ensureDir(paths.logDir);
  await fs.ensureDir(paths.reportDir);
};
