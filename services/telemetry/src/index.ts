import { createTelemetryApp } from './app';
import { EventStore } from './store';

const port = Number(process.env.PORT || 4002);
const MAX_EVENTS = Number(process.env.MAX_EVENTS || 1500);
const LOG_TO_CONSOLE = process.env.LOG_TO_CONSOLE === '1';

const app = createTelemetryApp({
    store: new EventStore(MAX_EVENTS),
    port,
    logToConsole: LOG_TO_CONSOLE
});

app.listen(port, () => {
    console.log(`Telemetry Service listening at http://localhost:${port}`);
});
