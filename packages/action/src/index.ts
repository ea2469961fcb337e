/**
 * GitHub Action entry point.
 */

import { run } from './action.js';

await run();
