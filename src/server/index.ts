import { createServer } from 'node:http';
import { WebSocketServer } from 'ws';
import { loadConfig } from '../config.js';
import { DryRunSink, type CommandSink } from '../dispatch/CommandSink.js';
import { DlinCommandSink, DlinLibrarian, createDlinRunner } from '../dispatch/dlin.js';
import { loadProfileTable } from '../profile/table.js';
import { JsonSlotStore } from '../slots/slotStore.js';
import { createApp } from './app.js';
import { checkWsToken } from './middleware/auth.js';
import { ControlConnection } from './services/ControlConnection.js';

const config = loadConfig();
const profiles = loadProfileTable(config.profileTablePath);
const slots = new JsonSlotStore(config.slotDir);
const dryRun = process.argv.includes('--dry-run');
const librarian = dryRun ? undefined : new DlinLibrarian(createDlinRunner(config.librarian));
const sink: CommandSink = librarian
  ? new DlinCommandSink(librarian, config.shaping.ranges.frequencyHz)
  : new DryRunSink();

const app = createApp({ config, profiles, slots });
const server = createServer(app);

console.log(`[boot] PROFILE_TABLE = ${config.profileTablePath} (v${profiles.version}: ${[...profiles.profiles.keys()].join(', ')})`);
console.log(`[boot] SLOT_DIR      = ${slots.root}`);
console.log(`[boot] SINK          = ${dryRun ? 'dry-run' : `${config.librarian.useSudo ? 'sudo ' : ''}${config.librarian.dlinPath}`}`);
if (profiles.issues.length > 0) {
  console.warn(`[boot] ${profiles.issues.length} profile issue(s); see [profiles] warnings above`);
}

// ── WebSocket: pad control ─────────────────────────────────────
// One pad drives one instrument: a second client is turned away.
const wss = new WebSocketServer({ server, path: '/ws' });
let active: ControlConnection | null = null;
// The previous connection's in-flight dispatch must finish before the next session sends
let linkFree: Promise<void> = Promise.resolve();

wss.on('connection', (ws, req) => {
  const url = new URL(req.url || '/', `http://${req.headers.host}`);
  const token = url.searchParams.get('token') ?? undefined;
  if (!checkWsToken(config.server.authToken, token)) {
    ws.close(4001, 'Unauthorized');
    return;
  }

  if (active) {
    ws.close(4002, 'Control session busy');
    console.warn('[control] Rejected connection: a control session is already active');
    return;
  }

  const connection = new ControlConnection(ws, { config, profiles, slots, sink, librarian, linkFree });
  active = connection;
  console.log('[control] Client connected');

  ws.on('message', (raw) => {
    connection.handleRaw(raw.toString()).catch((err: unknown) => {
      console.error('[control] Message handling failed:', err);
    });
  });

  const release = () => {
    if (active !== connection) return;
    linkFree = connection.destroy();
    active = null;
  };

  ws.on('close', () => {
    release();
    console.log('[control] Client disconnected');
  });

  ws.on('error', (err) => {
    console.error('[control] WebSocket error:', err.message);
    release();
  });
});

server.listen(config.server.port, () => {
  console.log(`formant-pad control server running at http://localhost:${config.server.port}`);
});
