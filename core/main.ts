/**
 * Carry Guard runtime entry point.
 *
 * Wires settings, exchange, safety, oracle and coordinator, reconciles
 * persisted state against the venue, then runs the decision loop and the
 * operator API until SIGINT/SIGTERM.
 */

import path from "path";
import { setTimeout as sleep } from "node:timers/promises";
import OpenAI from "openai";
import { AuditLog } from "./audit/AuditLog";
import { loadEnv, resolveRepoPath, resolveSettingsPath } from "./config/env";
import { Settings, loadSettings } from "./config/settings";
import { CycleScheduler } from "./cycle/CycleScheduler";
import { TradingCycle } from "./cycle/TradingCycle";
import { errorMessage } from "./domain/failures";
import { FallbackSwapSource, HttpJsonSwapSource, ManualSwapSource, SwapSource } from "./market/SwapSource";
import { FixedVixSource } from "./market/VixSource";
import {
    ExchangeAdapter,
    ExchangeGateway,
    ExchangeHealthMonitor,
    GmoFxAdapter,
    PaperFxAdapter,
    PositionReconciler,
    TokenBucket,
    loadGmoCredentials,
    maskCredentials,
    validateCredentials
} from "./exchange";
import { CoordinatorStateStore } from "./execution/CoordinatorStateStore";
import { ExecutionCoordinator } from "./execution/ExecutionCoordinator";
import { createNotifierFromEnv } from "./notify/DiscordWebhookNotifier";
import { notifyInBackground } from "./notify/Notifier";
import { startObserverServer } from "./observer-api";
import { NewsSource } from "./oracle/news/NewsSource";
import { StaticNewsSource } from "./oracle/news/StaticNewsSource";
import { TavilyNewsSource } from "./oracle/news/TavilyNewsSource";
import { OpenAiProposalOracle } from "./oracle/OpenAiProposalOracle";
import { OracleThrottle } from "./oracle/ProposalOracle";
import { ProposalGate } from "./proposal/ProposalGate";
import { ExternalKillSignal } from "./safety/kill_switch";
import { fileLockStateSource } from "./safety/lock_state";
import { SafetyInterlock } from "./safety/SafetyInterlock";

const ARM_COUNTDOWN_SECONDS = 5;

function buildAdapter(settings: Settings): ExchangeAdapter {
    if (settings.broker === "paper") {
        return new PaperFxAdapter();
    }

    const credentials = loadGmoCredentials();
    if (!credentials) {
        throw new Error("GMO_API_KEY and GMO_API_SECRET are required for broker=gmo");
    }
    const check = validateCredentials(credentials);
    if (!check.valid) {
        throw new Error(`Invalid GMO credentials: ${check.errors.join(", ")}`);
    }
    console.log("[Main] Using GMO credentials", maskCredentials(credentials));
    return new GmoFxAdapter(credentials);
}

function buildNewsSource(settings: Settings): NewsSource {
    const apiKey = process.env.TAVILY_API_KEY;
    if (!apiKey) {
        console.warn("[Main] TAVILY_API_KEY not set; oracle runs without news");
        return new StaticNewsSource();
    }
    return new TavilyNewsSource({
        apiKey,
        maxResults: settings.news.maxItems,
        maxChars: settings.news.maxChars,
        lookbackDays: settings.news.lookbackDays
    });
}

function buildSwapSource(settings: Settings): SwapSource {
    const manual = new ManualSwapSource(settings.swap.overrides);
    if (!settings.swap.sourceUrl) {
        return manual;
    }
    const feed = new HttpJsonSwapSource({ url: settings.swap.sourceUrl, timeoutMs: settings.swap.timeoutMs });
    return new FallbackSwapSource(feed, manual);
}

async function main(): Promise<void> {
    loadEnv();
    const settingsPath = resolveSettingsPath();
    const settings = loadSettings(settingsPath);

    const openaiKey = process.env.OPENAI_API_KEY;
    if (!openaiKey) {
        console.error("CRITICAL: OPENAI_API_KEY is required.");
        process.exit(1);
    }

    const notifier = createNotifierFromEnv();
    const lockState = fileLockStateSource(settingsPath);
    const killSignal = new ExternalKillSignal();

    // ---------------------------------------------------------------------
    // Exchange
    // ---------------------------------------------------------------------
    const adapter = buildAdapter(settings);
    const limiter = new TokenBucket({
        capacity: settings.rateLimit.capacity,
        refillPerSecond: settings.rateLimit.refillPerSecond
    });
    const gateway = new ExchangeGateway(
        adapter,
        { limiter, isArmed: () => lockState().armed },
        {
            backoff: {
                maxAttempts: settings.rateLimit.maxAttempts,
                baseDelayMs: settings.rateLimit.baseDelayMs,
                maxDelayMs: settings.rateLimit.maxDelayMs
            }
        }
    );
    const health = new ExchangeHealthMonitor(gateway, notifier);

    // ---------------------------------------------------------------------
    // Safety + persistence
    // ---------------------------------------------------------------------
    const dataDir = resolveRepoPath(settings.dataDir);
    const audit = new AuditLog(path.join(dataDir, "audit.jsonl"));
    await audit.init();

    const interlock = new SafetyInterlock({
        lockState,
        killSignal,
        killSwitch: {
            minMarginRatio: settings.killSwitch.minMarginRatio,
            cooldownMs: settings.killSwitch.cooldownMinutes * 60_000
        }
    });

    const coordinator = new ExecutionCoordinator({
        gateway,
        reconciler: new PositionReconciler(gateway, settings.pair),
        audit,
        store: new CoordinatorStateStore(path.join(dataDir, "coordinator_state.json")),
        notifier,
        lockState
    });
    await coordinator.init();
    console.log(`[Main] Coordinator ${coordinator.state}${coordinator.haltReason ? `: ${coordinator.haltReason}` : ""}`);

    // ---------------------------------------------------------------------
    // Arming
    // ---------------------------------------------------------------------
    const lock = lockState();
    if (lock.armed) {
        console.warn(`[Main] LIVE TRADING ARMED on ${adapter.exchange} ${settings.pair}. Starting in ${ARM_COUNTDOWN_SECONDS}s, Ctrl+C to abort.`);
        notifyInBackground(notifier, {
            type: "ARMED",
            level: "WARNING",
            message: `Live trading armed on ${adapter.exchange} ${settings.pair}`
        });
        for (let s = ARM_COUNTDOWN_SECONDS; s > 0; s--) {
            console.warn(`[Main] ${s}...`);
            await sleep(1000);
        }
    } else {
        console.log(`[Main] Not armed (config=${lock.configFlagArmed}, env=${lock.envFlagArmed}); orders will not be sent`);
    }

    // ---------------------------------------------------------------------
    // Cycle
    // ---------------------------------------------------------------------
    const oracle = new OpenAiProposalOracle(
        new OpenAI({ apiKey: openaiKey, timeout: settings.oracle.timeoutMs, maxRetries: 0 }),
        { model: settings.oracle.model, promptPath: resolveRepoPath(settings.oracle.promptPath), pair: settings.pair }
    );

    const cycle = new TradingCycle(
        {
            gateway,
            coordinator,
            interlock,
            gate: new ProposalGate({
                maxAgeMs: settings.proposal.maxAgeSeconds * 1000,
                maxRationaleLength: settings.proposal.maxRationaleLength
            }),
            oracle,
            news: buildNewsSource(settings),
            swap: buildSwapSource(settings),
            vix: new FixedVixSource(settings.vix.value),
            throttle: new OracleThrottle(settings.aiIntervalMinutes * 60_000),
            audit,
            health
        },
        {
            pair: settings.pair,
            maxLeverage: settings.maxLeverage,
            lotUnit: settings.lotUnit,
            oracleTimeoutMs: settings.oracle.timeoutMs,
            vixThreshold: settings.vix.threshold
        }
    );
    const scheduler = new CycleScheduler(cycle, settings.intervalSeconds * 1000);

    const server = await startObserverServer(
        {
            pair: settings.pair,
            coordinator,
            interlock,
            killSignal,
            audit,
            health,
            token: process.env.OBSERVER_TOKEN || ""
        },
        settings.observer.port
    );

    health.start();
    scheduler.start();

    // ---------------------------------------------------------------------
    // Shutdown
    // ---------------------------------------------------------------------
    let shuttingDown = false;
    const shutdown = async (signal: string) => {
        if (shuttingDown) return;
        shuttingDown = true;
        console.log(`[Main] ${signal} received, shutting down`);

        health.stop();
        await scheduler.stop();
        await coordinator.requestStop(signal);
        await coordinator.drain();

        server.close(() => {
            console.log("[Main] Observer API closed");
            process.exit(0);
        });
        setTimeout(() => process.exit(1), 5000).unref();
    };

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
        process.on(signal, () => {
            shutdown(signal).catch((err: unknown) => {
                console.error(`[Main] Shutdown failed: ${errorMessage(err)}`);
                process.exit(1);
            });
        });
    }
}

main().catch((err: unknown) => {
    console.error("[Main] Fatal:", err);
    process.exit(1);
});
