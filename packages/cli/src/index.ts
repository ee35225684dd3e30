/**
 * trialrun CLI - run test cases and export their results
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
