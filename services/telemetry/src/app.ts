import express from 'express';
import cors from 'cors';
import { DASHBOARD_HTML } from './dashboard';
import { EventStore } from './store';

export interface TelemetryAppOptions {
    store: EventStore;
    port: number;
    logToConsole?: boolean;
}

export function createTelemetryApp(options: TelemetryAppOptions) {
    const app = express();
    const { store } = options;

    app.use(cors());
    app.use(express.json());

    app.post('/event', (req, res) => {
        const event = store.ingest(req.body, Date.now());
        if (!event) {
            res.status(400).json({ error: 'Event needs a non-empty string type' });
            return;
        }

        if (options.logToConsole) {
            console.log('[Telemetry Service] Received Event:', JSON.stringify(event));
        }

        res.status(202).send(); // Accepted
    });

    app.get('/events', (req, res) => {
        res.json(store.recent(req.query.limit));
    });

    app.get('/stats', (_req, res) => {
        res.json({ port: options.port, ...store.stats() });
    });

    app.get('/', (_req, res) => {
        res.type('html').send(DASHBOARD_HTML);
    });

    return app;
}
