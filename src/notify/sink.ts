import type { NotificationEvent } from "../core/notificationPolicy.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";

export interface NotificationSink {
  // Asks for permission when it has not been granted yet.
  ensurePermission(): Promise<boolean>;
  notify(title: string, body: string): Promise<void>;
}

/** Desktop notifications are out of reach here; alerts print to stdout. */
export class ConsoleNotificationSink implements NotificationSink {
  constructor(private readonly write: (line: string) => void = (l) => process.stdout.write(l)) {}

  async ensurePermission(): Promise<boolean> {
    return true;
  }

  async notify(title: string, body: string): Promise<void> {
    this.write(`[alert] ${title}: ${body}\n`);
  }
}

export type DeliveryResult = {
  delivered: number;
  skipped: "no-events" | "no-permission" | null;
};

// Missing permission is not a failure: the alerts are dropped and the
// evaluated state stays recorded so they do not replay later.
export async function deliverNotifications(
  sink: NotificationSink,
  events: readonly NotificationEvent[],
  log: Logger
): Promise<DeliveryResult> {
  if (events.length === 0) return { delivered: 0, skipped: "no-events" };

  let permitted: boolean;
  try {
    permitted = await sink.ensurePermission();
  } catch (err) {
    log.warn("notification permission check failed", { error: errorMessage(err) });
    permitted = false;
  }
  if (!permitted) {
    log.debug("notification permission not granted; dropping alerts", { count: events.length });
    return { delivered: 0, skipped: "no-permission" };
  }

  let delivered = 0;
  for (const evt of events) {
    try {
      await sink.notify(evt.title, evt.body);
      delivered += 1;
    } catch (err) {
      log.warn("failed to deliver notification", {
        dimension: evt.dimension,
        error: errorMessage(err),
      });
    }
  }
  return { delivered, skipped: null };
}
