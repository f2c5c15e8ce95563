import * as fs from 'fs';
import { errorMessage } from './errors';
import type { Logger } from './logger';

export const REDACTION = '!!!';

/**
 * Replaces banned words in outbound text. An empty word list (or one that
 * failed to load) leaves text untouched.
 */
export class ContentFilter {
  private words: string[];

  constructor(words: readonly string[] = []) {
    this.words = words.map(word => word.trim()).filter(word => word.length > 0);
  }

  /** Load a word list, one word per line. A missing file yields an empty filter. */
  static fromFile(filePath: string, logger: Logger): ContentFilter {
    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      const filter = new ContentFilter(content.split(/\r?\n/));
      logger.info('filter', `Loaded ${filter.size} banned word(s) from ${filePath}`);
      return filter;
    } catch (error) {
      logger.error('filter', `Word list ${filePath} could not be loaded, filtering disabled`, errorMessage(error));
      return new ContentFilter();
    }
  }

  get size(): number {
    return this.words.length;
  }

  apply(text: string): string {
    let result = text;
    for (const word of this.words) {
      result = result.split(word).join(REDACTION);
    }
    return result;
  }
}
