/**
 * Release Logger
 * Persists every pipeline stage of a run to a Markdown log under the state dir
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

import type { PipelineStage } from './types.js';

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  stage: LogStage;
  event: string;
  message: string;
  data?: Record<string, unknown>;
  level: LogLevel;
}

export type LogLevel = 'info' | 'warn' | 'error' | 'success' | 'debug';

/**
 * Pipeline stages plus the bookends of a run
 */
export type LogStage = 'run' | PipelineStage | 'completion';

export const LOG_FILE_NAME = 'RELEASE_LOG.md';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  success: 1,
  warn: 2,
  error: 3,
};

const SUMMARY_MARKER = '## Summary Statistics';

export interface ReleaseLoggerOptions {
  /** Entries below this level are not recorded */
  minLevel?: LogLevel;
}

/**
 * Appends one "Run" section per pipeline run to <stateDir>/RELEASE_LOG.md.
 * Branches log concurrently; writes are queued so the file is rewritten
 * by one writer at a time.
 */
export class ReleaseLogger {
  readonly logFile: string;
  private readonly stateDir: string;
  private readonly minLevel: LogLevel;
  private readonly runStartedAt = new Date().toISOString();
  private entries: LogEntry[] = [];
  private history = '';
  private initialized: Promise<void> | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(stateDir: string, options: ReleaseLoggerOptions = {}) {
    this.stateDir = stateDir;
    this.logFile = path.join(stateDir, LOG_FILE_NAME);
    this.minLevel = options.minLevel ?? 'info';
  }

  /**
   * Create the state dir and keep earlier runs from an existing log
   */
  initialize(): Promise<void> {
    if (!this.initialized) {
      this.initialized = (async () => {
        await fs.mkdir(this.stateDir, { recursive: true });
        try {
          const content = await fs.readFile(this.logFile, 'utf-8');
          this.history = extractRunSections(content);
        } catch {
          this.history = ''; // first run
        }
      })();
    }
    return this.initialized;
  }

  async log(
    stage: LogStage,
    event: string,
    message: string,
    data?: Record<string, unknown>,
    level: LogLevel = 'info',
  ): Promise<void> {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    await this.initialize();

    this.entries.push({
      timestamp: new Date().toISOString(),
      stage,
      event,
      message,
      data,
      level,
    });

    const write = this.writeQueue.then(() => this.persist());
    this.writeQueue = write;
    await write;
  }

  async debug(stage: LogStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'debug');
  }

  async info(stage: LogStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'info');
  }

  async warn(stage: LogStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'warn');
  }

  async error(stage: LogStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'error');
  }

  async success(stage: LogStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'success');
  }

  async stageStart(stage: LogStage, description: string, data?: Record<string, unknown>): Promise<void> {
    await this.info(stage, 'stage_start', `Starting: ${description}`, data);
  }

  async stageComplete(stage: LogStage, description: string, data?: Record<string, unknown>): Promise<void> {
    await this.success(stage, 'stage_complete', `Completed: ${description}`, data);
  }

  async stageFailed(stage: LogStage, description: string, error: string, data?: Record<string, unknown>): Promise<void> {
    await this.error(stage, 'stage_failed', `Failed: ${description} - ${error}`, data);
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesForStage(stage: LogStage): LogEntry[] {
    return this.entries.filter((e) => e.stage === stage);
  }

  getErrors(): LogEntry[] {
    return this.entries.filter((e) => e.level === 'error');
  }

  /** Wait for queued writes */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private async persist(): Promise<void> {
    try {
      await fs.writeFile(this.logFile, this.formatMarkdown(), 'utf-8');
    } catch (error) {
      console.error('Failed to persist release log:', error);
    }
  }

  private formatMarkdown(): string {
    const lines: string[] = [
      '# Release Log',
      '',
      'Every stage of each release run, newest run last.',
      '',
      '---',
      '',
    ];

    if (this.history) {
      lines.push(this.history.trimEnd(), '');
    }

    lines.push(`## Run: ${this.runStartedAt}`, '');

    for (const entry of this.entries) {
      const time = entry.timestamp.split('T')[1].split('.')[0];
      lines.push(`### [${time}] ${levelIcon(entry.level)} **${entry.stage}** - ${entry.message}`);

      if (entry.data && Object.keys(entry.data).length > 0) {
        lines.push(
          '',
          '<details>',
          '<summary>Details</summary>',
          '',
          '```json',
          JSON.stringify(entry.data, null, 2),
          '```',
          '</details>',
        );
      }
      lines.push('');
    }

    lines.push(
      '---',
      '',
      SUMMARY_MARKER,
      '',
      `- **Entries (this run):** ${this.entries.length}`,
      `- **Errors:** ${this.entries.filter((e) => e.level === 'error').length}`,
      `- **Warnings:** ${this.entries.filter((e) => e.level === 'warn').length}`,
      `- **Successful Steps:** ${this.entries.filter((e) => e.level === 'success').length}`,
      '',
    );

    return lines.join('\n');
  }
}

function levelIcon(level: LogLevel): string {
  switch (level) {
    case 'error':
      return '[ERROR]';
    case 'warn':
      return '[WARN]';
    case 'success':
      return '[OK]';
    case 'debug':
      return '[DEBUG]';
    default:
      return '[INFO]';
  }
}

/** The "## Run:" sections of an existing log, without header or summary */
export function extractRunSections(content: string): string {
  const start = content.indexOf('## Run: ');
  if (start === -1) return '';
  let body = content.slice(start);
  const summary = body.lastIndexOf(SUMMARY_MARKER);
  if (summary !== -1) {
    body = body.slice(0, summary);
    // drop the rule that precedes the summary
    body = body.replace(/\n---\n*$/, '\n');
  }
  return body;
}
