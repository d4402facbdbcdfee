import type { Request, Response } from 'express';
import type { OnlineUsersData } from '../../types/api.js';
import type { PresenceStore } from '../../services/presence-store.js';
import type { Router } from '../../realtime/router.js';
import { logThought } from '../../utils/logger.js';
import { sendOk } from '../shared.js';

export interface OnlineUsersDeps {
    router: Pick<Router, 'getOnlineUsers'>;
    presence: Pick<PresenceStore, 'listPresent'>;
}

/**
 * GET /realtime/online — Users with a presence marker. Falls back to this
 * instance's registry when the presence store cannot be read.
 */
export function handleOnlineUsers(deps: OnlineUsersDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        let data: OnlineUsersData;
        try {
            data = { status: 'ok', source: 'presence', users: await deps.presence.listPresent() };
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            void logThought(`[API] Presence listing failed, serving local registry: ${message}`);
            data = { status: 'degraded', source: 'local', users: deps.router.getOnlineUsers() };
        }

        sendOk(res, data);
    };
}
