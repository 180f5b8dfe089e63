import { getRouterConfig } from './config/router-config.js';
import { createRuntime, startRuntime, type RunningRuntime } from './core/runtime.js';
import { logThought, scrubSensitiveText } from './utils/logger.js';

let running: RunningRuntime | null = null;
let stopping = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
    if (stopping) return;
    stopping = true;
    try {
        await running?.stop();
        await logThought(`Capability router received ${signal}; services stopped.`);
        process.exit(0);
    } catch (err) {
        const message = scrubSensitiveText(err instanceof Error ? err.message : String(err));
        console.error(`[Router] Shutdown failed: ${message}`);
        process.exit(1);
    }
}

process.on('SIGINT', () => {
    void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
});

// ── Entry Point ──────────────────────────────────────────────────────────────

async function main(): Promise<void> {
    const config = getRouterConfig();
    if (!config.backend.endpoint) {
        console.warn('[Router] BACKEND_ENDPOINT is not set; probes will fail and routing stays on the legacy backend.');
    }
    running = await startRuntime(createRuntime(config));
    void logThought(`[Router] Capability router started (API port ${config.runtime.apiPort}).`);
}

main().catch((err) => {
    const message = scrubSensitiveText(err instanceof Error ? err.message : String(err));
    console.error(`[Router] Startup failed: ${message}`);
    process.exit(1);
});
