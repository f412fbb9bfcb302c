import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { sessionSchema } from '../schemas/homgar.schema.js';
import type { HomgarLogger, HomgarSession } from '../types/index.js';

export interface SessionStore {
  load(): Promise<HomgarSession | null>;
  save(session: HomgarSession): Promise<void>;
}

export class MemorySessionStore implements SessionStore {
  private session: HomgarSession | null;

  constructor(initial: HomgarSession | null = null) {
    this.session = initial;
  }

  async load(): Promise<HomgarSession | null> {
    return this.session;
  }

  async save(session: HomgarSession): Promise<void> {
    this.session = session;
  }
}

/**
 * Keeps the session in a JSON file so a still-valid token survives restarts.
 * A missing or unreadable file is treated as having no session.
 */
export class FileSessionStore implements SessionStore {
  constructor(
    private readonly path: string,
    private readonly logger?: HomgarLogger
  ) {}

  async load(): Promise<HomgarSession | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf8');
    } catch (error) {
      this.logger?.info('Could not load session file, starting fresh', {
        path: this.path,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.logger?.info('Session file is not valid JSON, starting fresh', { path: this.path });
      return null;
    }

    const parsed = sessionSchema.safeParse(json);
    if (!parsed.success) {
      this.logger?.info('Session file has an unexpected shape, starting fresh', { path: this.path });
      return null;
    }
    return parsed.data;
  }

  async save(session: HomgarSession): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, JSON.stringify(session), { encoding: 'utf8', mode: 0o600 });
  }
}
