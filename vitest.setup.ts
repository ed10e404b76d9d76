/**
 * Shared test setup: keep the logger quiet and make sure no test reads the
 * developer's real home or library.
 */

import os from 'node:os';
import path from 'node:path';

process.env.PROVENANT_LOG_LEVEL ??= 'silent';
process.env.PROVENANT_HOME ??= path.join(os.tmpdir(), 'provenant-test-home-unused');
