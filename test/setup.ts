import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import * as crypto from 'crypto';

// Global test configuration
jest.setTimeout(30000);

// Mock console to reduce noise in tests
const originalConsole = console;
beforeAll(() => {
  global.console = {
    ...console,
    log: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
});

afterAll(() => {
  global.console = originalConsole;
});

// Helper to create temporary test directories
export const createTempDir = async (): Promise<string> => {
  const tempDir = path.join(
    os.tmpdir(),
    `phpswitch-test-${Date.now()}-${crypto.randomBytes(4).toString('hex')}`
  );
  await fs.ensureDir(tempDir);
  // macOS puts tmpdir behind a symlink; tests compare resolved paths
  return fs.realpath(tempDir);
};

// Helper to clean up test directories
export const cleanupTempDir = async (dir: string): Promise<void> => {
  try {
    await fs.remove(dir);
  } catch {
    // Ignore cleanup errors
  }
};

export const writeFile = async (dir: string, relativePath: string, content: string): Promise<string> => {
  const filePath = path.join(dir, relativePath);
  await fs.ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, content);
  return filePath;
};

/**
 * Lays out a Homebrew-style keg for `formula` under `prefix`:
 * Cellar/<formula>/<release>/bin/php plus the opt/<formula> link.
 */
export const createFakeKeg = async (prefix: string, formula: string, release = '1.0.0'): Promise<string> => {
  const keg = path.join(prefix, 'Cellar', formula, release);
  for (const dir of ['bin', 'sbin']) {
    await fs.ensureDir(path.join(keg, dir));
  }
  const binary = path.join(keg, 'bin', 'php');
  await fs.writeFile(binary, '#!/bin/sh\necho "PHP test"\n');
  await fs.chmod(binary, 0o755);

  const optLink = path.join(prefix, 'opt', formula);
  await fs.ensureDir(path.dirname(optLink));
  await fs.remove(optLink);
  await fs.symlink(keg, optLink);
  return keg;
};

export const backdate = async (filePath: string, secondsAgo: number): Promise<void> => {
  const when = new Date(Date.now() - secondsAgo * 1000);
  await fs.utimes(filePath, when, when);
};
