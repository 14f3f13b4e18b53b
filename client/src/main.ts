/**
 * Headless entry point.
 *
 * Connects to a world server over WebSocket, runs the session loop and logs
 * frame statistics until the server goes away or the process is interrupted.
 *
 *   VOXELMERE_SERVER_URL  server address (default ws://localhost:9000)
 *   VOXELMERE_*           runtime config overrides, see loadConfigFromEnv
 *   LOG_LEVEL             debug | info | warn | error
 */

import { DEFAULT_SERVER_URL, loadConfigFromEnv } from './config';
import { createLogger, setLogLevel } from './core/logger';
import { ClientSession } from './engine/ClientSession';
import { Engine } from './engine/Engine';
import { WebSocketClient } from './net/webSocketClient';

const log = createLogger('Main');

const STATS_INTERVAL_MS = 5000;

function main(): void {
  const { valid, config, errors } = loadConfigFromEnv();
  if (!valid) {
    for (const e of errors) log.error(e);
    process.exitCode = 1;
    return;
  }
  setLogLevel(config.logLevel);

  const url = process.env.VOXELMERE_SERVER_URL || DEFAULT_SERVER_URL;
  log.info(`Connecting to ${url}`);
  const client = WebSocketClient.connect(url);
  const session = new ClientSession(client, { config });
  const engine = new Engine(session);

  const unsubGameData = session.events.on('game_data_received', ({ blockCount, itemCount }) => {
    log.info(`World ready: ${blockCount} blocks, ${itemCount} items`);
  });

  const statsTimer = setInterval(() => {
    const s = session.stats();
    const p = session.playerPosition;
    log.info(
      `fps=${s.fps} chunks=${session.chunks.chunkCount} meshes=${session.meshes.size} ` +
        `quads=${session.meshes.totalQuads} meshing=${s.totalMeshingMs}ms ` +
        `pos=(${p.x.toFixed(1)}, ${p.y.toFixed(1)}, ${p.z.toFixed(1)})`,
    );
  }, STATS_INTERVAL_MS);

  engine.onStop((reason) => {
    clearInterval(statsTimer);
    unsubGameData();
    client.disconnect();
    session.dispose();
    if (reason && reason.kind === 'protocol_desync') process.exitCode = 2;
  });

  process.once('SIGINT', () => engine.stop());
  engine.start();
}

main();
