import { parseDirection } from './languages.js';
import type { WorkerCommand, WorkerEvent } from './worker/protocol.js';

export const HELP_TEXT = [
  'Commands:',
  '  t              toggle translation direction',
  '  d <src> <tgt>  set direction, e.g. "d ja en" or "d ja→en"',
  '  s              switch between system audio and microphone',
  '  q              quit',
].join('\n');

export type InputAction = WorkerCommand | { type: 'help' };

/** One typed line → action; null when it means nothing. */
export function parseInputLine(line: string): InputAction | null {
  const [keyword = '', ...rest] = line.trim().split(/\s+/);

  switch (keyword.toLowerCase()) {
    case 't':
      return { type: 'toggle' };
    case 's':
      return { type: 'switch_source' };
    case 'q':
      return { type: 'stop' };
    case 'h':
    case '?':
      return { type: 'help' };
    case 'd': {
      const text = rest.length === 2 ? `${rest[0]}→${rest[1]}` : rest.join('');
      const direction = parseDirection(text);
      return direction ? { type: 'set_direction', direction } : null;
    }
    default:
      return null;
  }
}

/** Terminal rendering of a worker event. Health reports are not printed. */
export function formatEvent(event: WorkerEvent): string | null {
  if ('original' in event) {
    return event.translated ? `  ${event.original}\n» ${event.translated}` : `… ${event.original}`;
  }
  if ('direction' in event) return `[direction] ${event.direction}`;
  if ('source' in event) return `[source] ${event.source === 'mic' ? 'microphone' : 'system audio'}`;
  if ('error' in event) return `[error${event.fatal ? ', fatal' : ''}] ${event.error}`;
  return null;
}
