/**
 * Telemetry capture helper for tests.
 *
 * Installs a test sink and returns the captured events. Call the returned
 * `restore()` in afterEach.
 */

import { setTestSink, type TelemetryShape } from "../../src/utils/telemetry.js";

export interface CapturedEvent {
  event: string;
  data: TelemetryShape;
}

export function captureTelemetry(): { events: CapturedEvent[]; restore: () => void } {
  const events: CapturedEvent[] = [];
  setTestSink((event, data) => {
    events.push({ event, data });
  });
  return {
    events,
    restore: () => setTestSink(null),
  };
}

export function eventsNamed(events: CapturedEvent[], name: string): CapturedEvent[] {
  return events.filter((e) => e.event === name);
}
