import fs from 'fs/promises';
import path from 'path';
import { describeError, logger } from './logger';

// Leftovers yt-dlp writes while a download is still in progress
const PARTIAL_SUFFIXES = ['.part', '.ytdl', '.temp', '.json'];

/**
 * FileManager - Owns the shared download directory
 * Every extraction gets its own session directory, so concurrent slots never collide
 */
export class FileManager {
  private readonly downloadDir: string;

  constructor(downloadDirectory: string = './downloads') {
    this.downloadDir = downloadDirectory;
  }

  /**
   * Initialize download directory (create if doesn't exist)
   */
  async initialize(): Promise<void> {
    try {
      await fs.mkdir(this.downloadDir, { recursive: true });
      logger.info('📁 Download directory initialized', { path: this.downloadDir });
    } catch (error) {
      logger.error('Failed to create download directory', { error });
      throw error;
    }
  }

  sessionPath(sessionId: string): string {
    return path.join(this.downloadDir, sessionId);
  }

  /**
   * Create session directory
   */
  async createSessionDir(sessionId: string): Promise<string> {
    try {
      const sessionDir = this.sessionPath(sessionId);
      await fs.mkdir(sessionDir, { recursive: true });
      return sessionDir;
    } catch (error) {
      logger.error('Failed to create session directory', { sessionId, error });
      throw error;
    }
  }

  /**
   * Finished media files in a session directory, sorted by name
   */
  async listSessionFiles(sessionId: string): Promise<string[]> {
    const sessionDir = this.sessionPath(sessionId);
    try {
      const entries = await fs.readdir(sessionDir);
      return entries
        .filter((name) => !PARTIAL_SUFFIXES.some((suffix) => name.endsWith(suffix)))
        .sort()
        .map((name) => path.join(sessionDir, name));
    } catch (error: unknown) {
      if (isMissing(error)) return [];
      throw error;
    }
  }

  /**
   * Clean up entire session directory
   */
  async cleanupSession(sessionId: string): Promise<void> {
    const sessionDir = this.sessionPath(sessionId);
    try {
      await fs.rm(sessionDir, { recursive: true, force: true });
      logger.info('🗑️ Session cleaned up', { sessionId });
    } catch (error: unknown) {
      logger.error('Failed to cleanup session', {
        sessionId,
        error: describeError(error),
      });
    }
  }

  /**
   * Get file size in bytes
   */
  async getFileSize(filePath: string): Promise<number> {
    const stats = await fs.stat(filePath);
    return stats.size;
  }

  /**
   * Sweep sessions that outlived their request (crash, kill -9, ...)
   */
  async cleanupOldFiles(maxAgeMinutes: number = 60): Promise<number> {
    let removed = 0;
    try {
      const files = await fs.readdir(this.downloadDir);
      const now = Date.now();

      const cleanupPromises = files.map(async (file) => {
        const filePath = path.join(this.downloadDir, file);
        try {
          const stats = await fs.stat(filePath);
          const ageMinutes = (now - stats.mtimeMs) / 1000 / 60;

          if (ageMinutes > maxAgeMinutes) {
            await fs.rm(filePath, { recursive: true, force: true });
            removed += 1;
            logger.info('🗑️ Old file/directory cleaned', {
              path: filePath,
              ageMinutes: ageMinutes.toFixed(1),
            });
          }
        } catch (err: unknown) {
          logger.warn('Failed to process file for cleanup', {
            filePath,
            error: describeError(err),
          });
        }
      });

      await Promise.allSettled(cleanupPromises);
    } catch (error: unknown) {
      logger.error('Failed to cleanup old files', { error });
    }
    return removed;
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
