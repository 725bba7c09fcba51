import { DEFAULT_DIRECTION, type Direction } from '../languages.js';

/**
 * Everything the debouncer remembers between calls. Owned by whoever builds
 * the pipeline and mutated only by the debouncer.
 */
export interface TranslationState {
  direction: Direction;
  /** Text of the most recent dispatch; identical text is not re-sent. */
  lastTranslated: string;
  /** Newest transcript seen by `update`. */
  pendingText: string;
  /** Sequence number of the newest dispatch. */
  sequence: number;
}

export function createTranslationState(direction: Direction = DEFAULT_DIRECTION): TranslationState {
  return {
    direction: { ...direction },
    lastTranslated: '',
    pendingText: '',
    sequence: 0,
  };
}
