/**
 * Ora-backed spinner shown while a single download runs.
 */

import ora, { type Ora } from 'ora';

export class Spinner {
  private spinner: Ora;

  constructor(message: string) {
    this.spinner = ora({ text: message, spinner: 'dots', isEnabled: process.stdout.isTTY === true });
  }

  /**
   * Spin until `task` settles. The spinner ends with a checkmark and
   * `done(result)`, or with a cross and `failure` before the error is rethrown.
   */
  async around<T>(task: () => Promise<T>, done: (result: T) => string, failure: string): Promise<T> {
    this.spinner.start();
    let result: T;
    try {
      result = await task();
    } catch (error) {
      this.spinner.fail(failure);
      throw error;
    }
    this.spinner.succeed(done(result));
    return result;
  }
}
