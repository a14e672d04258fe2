/**
 * Analysis Logger
 * Stage-tagged log of one analysis run, optionally persisted as markdown
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  stage: AnalysisStage;
  event: string;
  message: string;
  data?: Record<string, unknown>;
  level: LogLevel;
}

/**
 * Log levels for filtering and display
 */
export type LogLevel = 'info' | 'warn' | 'error' | 'success' | 'debug';

/**
 * Analysis stages for categorization
 */
export type AnalysisStage = 'scan' | 'rules' | 'evaluate' | 'report' | 'history';

export interface AnalysisLoggerOptions {
  /** Markdown file the log is rewritten to after every entry */
  logFile?: string | null;
  /** Called for each entry, e.g. to print it on the console */
  echo?: (entry: LogEntry) => void;
  /** Drop debug entries unless set */
  verbose?: boolean;
}

/**
 * Logger for one analysis run
 */
export class AnalysisLogger {
  private logFile: string | null;
  private echo?: (entry: LogEntry) => void;
  private verbose: boolean;
  private entries: LogEntry[] = [];
  private dirReady = false;

  constructor(options: AnalysisLoggerOptions = {}) {
    this.logFile = options.logFile ? path.resolve(options.logFile) : null;
    this.echo = options.echo;
    this.verbose = options.verbose ?? false;
  }

  /**
   * Record an entry
   */
  async log(
    stage: AnalysisStage,
    event: string,
    message: string,
    data?: Record<string, unknown>,
    level: LogLevel = 'info'
  ): Promise<void> {
    if (level === 'debug' && !this.verbose) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      stage,
      event,
      message,
      data,
      level,
    };

    this.entries.push(entry);
    this.echo?.(entry);
    await this.persist();
  }

  async debug(stage: AnalysisStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'debug');
  }

  async info(stage: AnalysisStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'info');
  }

  async warn(stage: AnalysisStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'warn');
  }

  async error(stage: AnalysisStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'error');
  }

  async success(stage: AnalysisStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'success');
  }

  /**
   * Log stage start
   */
  async stageStart(stage: AnalysisStage, description: string, data?: Record<string, unknown>): Promise<void> {
    await this.info(stage, 'stage_start', `Starting: ${description}`, data);
  }

  /**
   * Log stage completion
   */
  async stageComplete(stage: AnalysisStage, description: string, data?: Record<string, unknown>): Promise<void> {
    await this.success(stage, 'stage_complete', `Completed: ${description}`, data);
  }

  /**
   * Rewrite the log file, if one is configured
   */
  private async persist(): Promise<void> {
    if (!this.logFile) return;

    try {
      if (!this.dirReady) {
        await fs.mkdir(path.dirname(this.logFile), { recursive: true });
        this.dirReady = true;
      }
      await fs.writeFile(this.logFile, this.formatMarkdown(), 'utf-8');
    } catch (error) {
      console.error('Failed to persist analysis log:', error);
    }
  }

  /**
   * Format log entries as markdown
   */
  formatMarkdown(): string {
    const lines: string[] = ['# Analysis Log', '', '---', ''];

    for (const entry of this.entries) {
      const time = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
      lines.push(`### [${time}] ${getLevelTag(entry.level)} **${entry.stage}** - ${entry.message}`);

      if (entry.data && Object.keys(entry.data).length > 0) {
        lines.push('');
        lines.push('```json');
        lines.push(JSON.stringify(entry.data, null, 2));
        lines.push('```');
      }

      lines.push('');
    }

    lines.push('---');
    lines.push('');
    lines.push(`- **Total Entries:** ${this.entries.length}`);
    lines.push(`- **Errors:** ${this.entries.filter((e) => e.level === 'error').length}`);
    lines.push(`- **Warnings:** ${this.entries.filter((e) => e.level === 'warn').length}`);
    lines.push('');

    return lines.join('\n');
  }

  /**
   * Get all log entries
   */
  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /**
   * Get entries for a specific stage
   */
  getEntriesForStage(stage: AnalysisStage): LogEntry[] {
    return this.entries.filter((e) => e.stage === stage);
  }

  /**
   * Get warning entries
   */
  getWarnings(): LogEntry[] {
    return this.entries.filter((e) => e.level === 'warn');
  }
}

/**
 * Bracketed tag for a log level
 */
export function getLevelTag(level: LogLevel): string {
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
