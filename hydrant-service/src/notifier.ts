import type { Logger } from "pino";

export interface Notifier {
  notify(message: string): void | Promise<void>;
}

/** Delivers alerts as warn-level log lines. */
export class LogNotifier implements Notifier {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  notify(message: string): void {
    this.logger.warn({ alert: true }, `ALERT: ${message}`);
  }
}

export async function notifySafely(notifier: Notifier, message: string, logger: Logger): Promise<boolean> {
  try {
    await notifier.notify(message);
    return true;
  }
  catch (err) {
    logger.error({ err }, "Failed to deliver pipeline alert");
    return false;
  }
}
