import { createLogger } from '../logging/Logger';
import { telemetry } from '../telemetry/Telemetry';
import type { Startable } from './Startable';

const log = createLogger('startup');

/**
 * Starts tasks one after another in registration order and stops the started
 * ones in reverse order. A task that fails to start aborts startup.
 */
export class StartupTaskRunner {
  private readonly tasks: Startable[] = [];
  private readonly started: Startable[] = [];

  register(task: Startable): this {
    this.tasks.push(task);
    return this;
  }

  registered(): readonly string[] {
    return this.tasks.map((task) => task.name);
  }

  async startAll(): Promise<void> {
    for (const task of this.tasks) {
      if (this.started.includes(task)) continue;
      log.debug('starting task', { task: task.name });
      try {
        await telemetry.time('startup.task', { task: task.name }, () =>
          task.start(),
        );
      } catch (err) {
        log.error('task failed to start', { task: task.name, err });
        throw err;
      }
      this.started.push(task);
    }
  }

  /** Stop failures are logged; every started task still gets its stop call. */
  async stopAll(): Promise<void> {
    while (this.started.length > 0) {
      const task = this.started.pop();
      if (!task) break;
      try {
        await task.stop();
      } catch (err) {
        log.error('task failed to stop', { task: task.name, err });
      }
    }
  }
}
