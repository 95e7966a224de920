import { createLogger } from '../logging/Logger';
import { telemetryStore, type TelemetryEvent } from './TelemetryStore';

export type TelemetryOptions = {
  enabled: boolean;
  structuredLogs: boolean;
};

const log = createLogger('telemetry');

let options: TelemetryOptions = { enabled: true, structuredLogs: true };

export function configureTelemetry(next: Partial<TelemetryOptions>) {
  options = { ...options, ...next };
}

const nowMs = (): number => performance.now();

export const telemetry = {
  nowMs,

  record(event: Omit<TelemetryEvent, 'ts'> & { ts?: string }) {
    if (!options.enabled) return;

    const stored = telemetryStore.record(event);

    if (options.structuredLogs) {
      log.debug(stored.name, {
        durationMs: stored.durationMs,
        tags: stored.tags,
        metrics: stored.metrics,
        detail: stored.message,
      });
    }
  },

  /** Times `work` and records one event, tagging failures with `ok: false`. */
  async time<T>(
    name: string,
    tags: Record<string, string | number | boolean>,
    work: () => Promise<T>,
  ): Promise<T> {
    const startedAtMs = nowMs();
    try {
      const value = await work();
      telemetry.record({
        name,
        durationMs: nowMs() - startedAtMs,
        tags: { ...tags, ok: true },
      });
      return value;
    } catch (err) {
      telemetry.record({
        name,
        durationMs: nowMs() - startedAtMs,
        tags: { ...tags, ok: false },
      });
      throw err;
    }
  },
};
