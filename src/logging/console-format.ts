import type { StructuredLogEvent } from './structured-log-event.js';

import { ANSI_RESET, COLOR_BY_SEVERITY } from './logfmt.js';

interface FormatOptions {
  color?: boolean;
}

function contextLabel(event: StructuredLogEvent): string {
  if (event.operation !== undefined) return event.operation;
  if (event.backend !== undefined) return event.model !== undefined ? `${event.backend}/${event.model}` : event.backend;
  return event.type;
}

/** `WRN [3.2] FileRead: message` with the ERR stack indented below. */
export function formatConsole(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const position = event.attempt !== undefined ? `${String(event.step)}.${String(event.attempt)}` : String(event.step);
  const arrow = event.direction === 'request' ? '→' : '←';
  const prefix = `${event.severity} [${position}] ${arrow} ${contextLabel(event)}:`;
  let output = options.color === true
    ? `${COLOR_BY_SEVERITY[event.severity]}${prefix}${ANSI_RESET} ${event.message}`
    : `${prefix} ${event.message}`;

  if (event.severity === 'ERR' && typeof event.stack === 'string' && event.stack.length > 0) {
    const stackLines = event.stack.split('\n').map((line) => `    ${line}`).join('\n');
    output += `\n${stackLines}`;
  }

  return output;
}
