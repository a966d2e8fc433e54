import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import type { OutputConfig } from '../config/schema';
import type { RawImage } from '../frame/types';
import { PngImageWriter, type ImageWriter } from './png-writer';
import type { Logger } from '../observability/types';
import { rootLogger } from '../observability/logger';
import { WriteError, isPipelineError } from '../../core/errors';

export interface OutputDraft {
  sequence: number;
  capturedAt: number;
  image: RawImage;
}

export interface OutputRecord extends OutputDraft {
  writtenPath: string;
}

const MAX_RUN_DIRECTORY_ATTEMPTS = 100;

/** `run_20240501-093012-042` for 2024-05-01T09:30:12.042Z. */
export function runDirectoryName(date: Date): string {
  const pad = (value: number, width = 2) => String(value).padStart(width, '0');
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `run_${day}-${time}-${pad(date.getUTCMilliseconds(), 3)}`;
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Owns the output directory. Each processed frame becomes one
 * `frame_<sequence>.png`, so file order follows capture order.
 */
export class OutputSink {
  private directory: string | null = null;
  private readonly log: Logger;

  constructor(
    private readonly config: OutputConfig,
    private readonly writer: ImageWriter = new PngImageWriter(),
    logger: Logger = rootLogger,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.log = logger.child({ component: 'OutputSink' });
  }

  get overwrite(): boolean {
    return this.config.reuseDirectory;
  }

  async prepare(): Promise<string> {
    if (this.directory) return this.directory;
    const base = path.resolve(this.config.dir);

    try {
      await mkdir(base, { recursive: true });
      if (this.config.reuseDirectory) {
        this.directory = base;
      } else {
        this.directory = await this.createRunDirectory(base);
      }
    } catch (e) {
      if (isPipelineError(e)) throw e;
      throw new WriteError(`Cannot create output directory under ${base}`, base, { cause: e });
    }

    this.log.info(`Writing frames to ${this.directory}`);
    return this.directory;
  }

  private async createRunDirectory(base: string): Promise<string> {
    const name = runDirectoryName(this.clock());
    for (let attempt = 0; attempt < MAX_RUN_DIRECTORY_ATTEMPTS; attempt++) {
      const candidate = path.join(base, attempt === 0 ? name : `${name}-${attempt}`);
      try {
        await mkdir(candidate);
        return candidate;
      } catch (e) {
        if (!hasCode(e, 'EEXIST')) throw e;
      }
    }
    throw new WriteError(`No free run directory for ${name}`, base);
  }

  fileNameFor(sequence: number): string {
    return `frame_${String(sequence).padStart(this.config.sequencePadding, '0')}.png`;
  }

  pathFor(sequence: number): string {
    if (!this.directory) {
      throw new Error('OutputSink.prepare() must run before writing');
    }
    return path.join(this.directory, this.fileNameFor(sequence));
  }

  async write(draft: OutputDraft): Promise<OutputRecord> {
    const target = this.pathFor(draft.sequence);
    try {
      await this.writer.encodeAndWrite(target, draft.image, { overwrite: this.overwrite });
    } catch (e) {
      const reason = hasCode(e, 'EEXIST') ? 'file already exists' : e instanceof Error ? e.message : String(e);
      throw new WriteError(`Failed to write frame ${draft.sequence}: ${reason}`, target, { cause: e });
    }
    return { ...draft, writtenPath: target };
  }
}
