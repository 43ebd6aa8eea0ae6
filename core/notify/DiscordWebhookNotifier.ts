/**
 * Discord webhook delivery. Also echoes every event to the console.
 */

import { ConsoleNotifier, NotificationEvent, NotificationLevel, Notifier } from "./Notifier";

const WEBHOOK_TIMEOUT_MS = 5000;

const EMBED_STYLE: Readonly<Record<NotificationLevel, { title: string; color: number }>> = {
    INFO: { title: "Info", color: 3066993 },
    WARNING: { title: "Warning", color: 16776960 },
    CRITICAL: { title: "CRITICAL", color: 15158332 }
};

export interface DiscordWebhookOptions {
    readonly username?: string;
    readonly timeoutMs?: number;
    readonly fetchImpl?: typeof fetch;
}

export class DiscordWebhookNotifier implements Notifier {
    readonly #webhookUrl: string;
    readonly #username: string;
    readonly #timeoutMs: number;
    readonly #fetch: typeof fetch;
    readonly #console = new ConsoleNotifier();

    constructor(webhookUrl: string, options: DiscordWebhookOptions = {}) {
        this.#webhookUrl = webhookUrl;
        this.#username = options.username ?? "Carry Guard";
        this.#timeoutMs = options.timeoutMs ?? WEBHOOK_TIMEOUT_MS;
        this.#fetch = options.fetchImpl ?? fetch;
    }

    async notify(event: NotificationEvent): Promise<void> {
        await this.#console.notify(event);

        const style = EMBED_STYLE[event.level];
        const payload = {
            username: this.#username,
            embeds: [{
                title: `${style.title}: ${event.type}`,
                description: event.message,
                color: style.color
            }]
        };

        const fetchImpl = this.#fetch;
        const response = await fetchImpl(this.#webhookUrl, {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify(payload),
            signal: AbortSignal.timeout(this.#timeoutMs)
        });

        if (!response.ok) {
            throw new Error(`Discord webhook returned HTTP ${response.status}`);
        }
    }
}

export function createNotifierFromEnv(env: NodeJS.ProcessEnv = process.env): Notifier {
    const url = env.DISCORD_WEBHOOK_URL;
    if (url) {
        console.log("[Notifier] Discord webhook enabled");
        return new DiscordWebhookNotifier(url);
    }
    return new ConsoleNotifier();
}
