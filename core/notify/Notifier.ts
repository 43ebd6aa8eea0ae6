/**
 * Operator notifications.
 *
 * Delivery is fire-and-forget from the trading path: a failing webhook is
 * logged and never blocks or fails a state transition.
 */

export type NotificationLevel = "INFO" | "WARNING" | "CRITICAL";

export type NotificationType =
    | "ARMED"
    | "KILL_SWITCH"
    | "HALTED"
    | "OPENED"
    | "CLOSED"
    | "RECONCILED"
    | "EXCHANGE_DOWN"
    | "EXCHANGE_UP"
    | "NOTICE";

export interface NotificationEvent {
    readonly type: NotificationType;
    readonly level: NotificationLevel;
    readonly message: string;
}

export interface Notifier {
    notify(event: NotificationEvent): Promise<void>;
}

/**
 * Dispatch without awaiting; failures are logged only.
 */
export function notifyInBackground(notifier: Notifier, event: NotificationEvent): void {
    void notifier.notify(event).catch((err: unknown) => {
        console.error(`[Notifier] Failed to deliver ${event.type}:`, err);
    });
}

// ============================================================================
// Console
// ============================================================================

export class ConsoleNotifier implements Notifier {
    async notify(event: NotificationEvent): Promise<void> {
        const line = `[NOTIFY] ${event.type} ${event.message}`;
        if (event.level === "CRITICAL") {
            console.error(line);
        } else if (event.level === "WARNING") {
            console.warn(line);
        } else {
            console.log(line);
        }
    }
}
