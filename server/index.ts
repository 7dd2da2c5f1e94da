import { createServer } from 'node:http';
import { pathToFileURL } from 'node:url';
import { ColonySimulation } from '../src/colony.ts';
import { worldSize, type ColonyConfig } from '../src/config.ts';
import { createLogger } from '../src/logger.ts';
import { hashJson } from '../src/rng.ts';
import { generateTerrain } from '../src/terrain/generator.ts';
import { loadColonyConfig, parseConfig, type ServerConfig } from './config.ts';
import { createHttpHandler } from './httpApi.ts';
import { PROTOCOL_VERSION, type WelcomeMsg } from './protocol.ts';
import { SimServer } from './simServer.ts';
import { WsHub } from './wsHub.ts';

export interface RunningServer {
  port: number;
  wsUrl: string;
  httpUrl: string;
  close: () => Promise<void>;
}

/**
 * Boots the colony and its status server.
 * @param colonyOverrides - Applied on top of the TOML colony settings.
 */
export async function startServer(
  config: ServerConfig,
  colonyOverrides: Partial<ColonyConfig> = {}
): Promise<RunningServer> {
  const logger = createLogger(config.logLevel);
  const colonyConfig: ColonyConfig = {
    ...loadColonyConfig(config, (msg) => logger.warn('config', msg)),
    ...colonyOverrides
  };
  const sessionId = Math.random().toString(36).slice(2, 10);
  const cfgHash = hashJson(colonyConfig);

  const terrain = generateTerrain(colonyConfig);
  logger.info(
    'terrain',
    `generated ${terrain.sizeX}x${terrain.sizeY}x${terrain.sizeZ} world from seed ${colonyConfig.seed}`
  );
  const colony = new ColonySimulation(terrain, colonyConfig, { logger });

  const welcome: WelcomeMsg = {
    type: 'welcome',
    sessionId,
    protocolVersion: PROTOCOL_VERSION,
    seed: colonyConfig.seed,
    cfgHash,
    world: worldSize(colonyConfig),
    config: colonyConfig
  };

  let simServer: SimServer | null = null;
  let wsHub: WsHub | null = null;

  const httpHandler = createHttpHandler({
    getStatus: () => ({
      tick: simServer?.getTickId() ?? 0,
      clients: wsHub?.getClientCount() ?? 0
    }),
    getColonyStatus: () => simServer?.getColony().getStatus() ?? null,
    getHistory: () => simServer?.getColony().history ?? [],
    cfgHash,
    seed: colonyConfig.seed
  });

  const httpServer = createServer((req, res) => {
    httpHandler(req, res);
  });

  wsHub = new WsHub(httpServer, welcome, { logger });
  simServer = new SimServer(config, colony, wsHub, logger);

  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      httpServer.off('error', onError);
      reject(err);
    };
    httpServer.once('error', onError);
    httpServer.listen({ port: config.port, host: config.host }, () => {
      httpServer.off('error', onError);
      resolve();
    });
  });

  const address = httpServer.address();
  const port = typeof address === 'object' && address ? address.port : config.port;

  simServer.start();

  const close = async () => {
    simServer?.stop();
    wsHub?.closeAll();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
  };

  const publicHost =
    config.host === '0.0.0.0' || config.host === '::' ? 'localhost' : config.host;
  return {
    port,
    wsUrl: `ws://${publicHost}:${port}`,
    httpUrl: `http://${publicHost}:${port}`,
    close
  };
}

export async function main(): Promise<void> {
  const config = parseConfig(process.argv.slice(2), process.env);
  const logger = createLogger(config.logLevel);
  const server = await startServer(config);
  logger.info('server', `listening on :${server.port}`);

  let closing = false;
  const shutdown = async () => {
    if (closing) return;
    closing = true;
    logger.info('server', 'shutting down');
    await server.close();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main().catch((err) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
