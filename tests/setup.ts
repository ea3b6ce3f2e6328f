/**
 * Vitest Setup File
 *
 * Keeps logger and CLI warning output out of test runs.
 */

import { vi } from 'vitest';
import { getLogger } from '../src/shared/services/logging.service.js';

getLogger().setMinLevel('emergency');

// Argument parsing warns on console.warn; tests that care spy on it themselves
vi.spyOn(console, 'warn').mockImplementation(() => undefined);
