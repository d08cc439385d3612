import { createSubLogger } from './logger.js';
import path from 'path';
import fs from 'fs';

const log = createSubLogger('fileLogger');

/**
 * Ensures the logs directory exists
 */
export function ensureLogsDirectory(logsDir: string): void {
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
    log.info(`Created logs directory at ${logsDir}`);
  }
}

/**
 * Formats one log file entry: timestamp header, content, separator rule
 */
export function formatLogEntry(content: string, now: Date = new Date()): string {
  return `\n[${now.toISOString()}]\n${content}\n${'='.repeat(80)}\n`;
}

/**
 * Writes data to a log file. Failures are logged, never thrown: a missing log
 * must not fail the operation being logged.
 * @param logsDir Directory holding the log files
 * @param filename The name of the log file
 * @param data The data to write to the file
 * @param append Whether to append to the file or overwrite it
 * @returns Path of the written file, or null when writing failed
 */
export function writeToLogFile(
  logsDir: string,
  filename: string,
  data: unknown,
  append = true
): string | null {
  const filePath = path.join(logsDir, filename);

  try {
    ensureLogsDirectory(logsDir);

    let content = '';
    if (typeof data === 'string') {
      content = data;
    } else {
      try {
        content = JSON.stringify(data, null, 2);
      } catch (error) {
        content = `[Error stringifying data: ${error instanceof Error ? error.message : String(error)}]`;
      }
    }

    const entry = formatLogEntry(content);

    if (append && fs.existsSync(filePath)) {
      fs.appendFileSync(filePath, entry);
      log.info(`Appended to log file: ${filename}`, { size: entry.length });
    } else {
      fs.writeFileSync(filePath, entry);
      log.info(`Created new log file: ${filename}`, { size: entry.length });
    }
    return filePath;
  } catch (error) {
    log.error(`Failed to write to log file: ${filename}`, { error });
    return null;
  }
}

/**
 * Logs the output of a package transaction
 * @param logsDir Directory holding the log files
 * @param operation The operation type, used in the file name
 * @param output Everything the transaction printed
 */
export function logTransaction(logsDir: string, operation: string, output: string): string | null {
  return writeToLogFile(logsDir, `transaction_${operation}.log`, output);
}
