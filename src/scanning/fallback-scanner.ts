/**
 * Fallback Scanner
 *
 * Tries backends in order; the first one that returns elements wins.
 */

import { ScanError, ErrorCode } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import type { Element } from '../shared/types/index.js';
import type { ElementScanner } from './scanner.interface.js';

const logger = createLogger('FallbackScanner');

export class FallbackScanner implements ElementScanner {
  readonly name = 'fallback';

  constructor(private readonly backends: readonly ElementScanner[]) {}

  /**
   * @throws ScanError with NO_ELEMENTS when no backend yields anything
   */
  async scan(): Promise<Element[]> {
    const attempted: string[] = [];

    for (const backend of this.backends) {
      attempted.push(backend.name);
      try {
        const elements = await backend.scan();
        if (elements.length > 0) {
          logger.debug('Scan complete', { backend: backend.name, count: elements.length });
          return elements;
        }
        logger.info('Backend found no elements', { backend: backend.name });
      } catch (error) {
        logger.warning('Backend failed; trying next', {
          backend: backend.name,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    throw new ScanError('No scanning backend found any elements', ErrorCode.NO_ELEMENTS, {
      backends: attempted,
    });
  }
}
