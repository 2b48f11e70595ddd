import { z } from 'zod';
import type { LogEntry, LogSink } from '../src/types';

const logEntrySchema = z.object({
  id: z.string(),
  level: z.enum(['debug', 'info', 'warn', 'error', 'fatal']),
  event_type: z.string(),
  message: z.string().optional(),
  metadata: z.record(z.string(), z.unknown()),
  timestamp: z.string(),
});

export interface CaptureSink {
  sink: LogSink;
  lines: string[];
  entries(): LogEntry[];
  last(): LogEntry | null;
}

function parseEntry(line: string): LogEntry {
  return logEntrySchema.parse(JSON.parse(line));
}

export function createCaptureSink(): CaptureSink {
  const lines: string[] = [];

  return {
    sink: (line) => {
      lines.push(line);
    },
    lines,
    entries: () => lines.map(parseEntry),
    last: () => {
      const line = lines[lines.length - 1];
      return line === undefined ? null : parseEntry(line);
    },
  };
}
