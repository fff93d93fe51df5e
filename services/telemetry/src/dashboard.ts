// Served at `/`; polls /stats and /events once a second.
export const DASHBOARD_HTML = `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>Tilewalker Telemetry</title>
  <style>
    body { font-family: ui-monospace, Menlo, Consolas, monospace; margin: 0; padding: 16px; background: #0b1220; color: #dbeafe; }
    h1 { margin: 0 0 8px; font-size: 18px; }
    #engine { margin-bottom: 8px; font-size: 14px; }
    .normal { color: #86efac; } .stuck { color: #fde047; } .recovering { color: #fdba74; } .stopped { color: #fca5a5; }
    #counts { margin-bottom: 12px; font-size: 12px; color: #93c5fd; }
    table { border-collapse: collapse; font-size: 12px; width: 100%; }
    th, td { text-align: left; padding: 2px 8px; border-bottom: 1px solid #1e293b; }
  </style>
</head>
<body>
  <h1>Tilewalker Telemetry</h1>
  <div id="engine">No engine events yet</div>
  <div id="counts"></div>
  <table>
    <thead><tr><th>received</th><th>type</th><th>state</th><th>focus</th><th>failures</th><th>position</th><th>detail</th></tr></thead>
    <tbody id="events"></tbody>
  </table>
  <script>
    function cell(text) {
      const td = document.createElement('td');
      td.textContent = text == null ? '' : String(text);
      return td;
    }

    function row(e) {
      const p = e.payload || {};
      const tr = document.createElement('tr');
      const at = p.x == null ? '' : p.x + ',' + p.y + ',' + p.z;
      const detail = e.type.startsWith('nav.') ? p.detail : JSON.stringify(p);
      [new Date(e.receivedAt).toLocaleTimeString(), e.type, p.engineState, p.focus, p.failures, at, detail]
        .forEach((value) => tr.appendChild(cell(value)));
      if (p.engineState) tr.className = p.engineState;
      return tr;
    }

    async function refresh() {
      const [statsResp, eventsResp] = await Promise.all([fetch('/stats'), fetch('/events?limit=200')]);
      const stats = await statsResp.json();
      const events = await eventsResp.json();

      const engine = document.getElementById('engine');
      if (stats.engine) {
        engine.className = stats.engine.engineState;
        engine.textContent = 'state=' + stats.engine.engineState + ' focus=' + stats.engine.focus
          + ' failures=' + stats.engine.failures + ' at ' + (stats.engine.position || '?');
      }
      document.getElementById('counts').textContent = 'retained=' + stats.retained + '/' + stats.maxEvents + ' '
        + Object.entries(stats.counts).map(([t, n]) => t + ':' + n).join(' ');
      document.getElementById('events').replaceChildren(...events.reverse().map(row));
    }

    refresh().catch((e) => console.warn('Tilewalker: dashboard refresh failed', e));
    setInterval(() => refresh().catch((e) => console.warn('Tilewalker: dashboard refresh failed', e)), 1000);
  </script>
</body>
</html>`;
