import type { Request, Response } from 'express';
import type { HealthData } from '../../types/api.js';
import type { PresenceStore } from '../../services/presence-store.js';
import type { Router } from '../../realtime/router.js';
import { logThought } from '../../utils/logger.js';
import { sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    router: Pick<Router, 'getStats'>;
    presence: Pick<PresenceStore, 'listPresent'>;
    presenceBackend: 'redis' | 'memory';
}

/** GET /health — Router diagnostics plus a presence store round-trip. */
export function handleHealth(deps: HealthDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        let reachable = true;
        try {
            await deps.presence.listPresent();
        } catch (err) {
            reachable = false;
            const message = err instanceof Error ? err.message : String(err);
            void logThought(`[API] Health check could not reach the presence store: ${message}`);
        }

        const data: HealthData = {
            status: reachable ? 'ok' : 'degraded',
            uptimeSec: Math.floor((Date.now() - startTime) / 1000),
            memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
            presence: { backend: deps.presenceBackend, reachable },
            realtime: deps.router.getStats(),
        };

        sendOk(res, data);
    };
}

/** GET /health/live — Process liveness only. */
export function handleLiveness() {
    return (_req: Request, res: Response): void => {
        sendOk(res, { status: 'live' });
    };
}
