import { createRuntime, getErrorMessage, type PipelineRuntime } from '@regverify/server';
import { error } from './format.js';

/**
 * Build the runtime, run a one-off command against it, close the pool.
 * Failures print and set a non-zero exit code.
 */
export async function withRuntime(fn: (runtime: PipelineRuntime) => Promise<void>): Promise<void> {
  let runtime: PipelineRuntime;
  try {
    runtime = createRuntime();
  } catch (err) {
    error(getErrorMessage(err));
    process.exitCode = 1;
    return;
  }

  try {
    await fn(runtime);
  } catch (err) {
    error(getErrorMessage(err));
    process.exitCode = 1;
  } finally {
    await runtime.close();
  }
}
