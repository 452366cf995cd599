import { loadConfig } from './config.js';
import { GameManager } from './game/GameManager.js';
import { GameServer } from './net/Server.js';
import { logger, setLogLevel } from './logger.js';

const config = loadConfig();
setLogLevel(config.logLevel);

const game = new GameManager({ queueCapacity: config.commandQueueCapacity });
const server = new GameServer(game, {
    host: config.host,
    port: config.port,
    highWaterBytes: config.broadcastHighWaterBytes
});

let shuttingDown = false;

server.listen().then(
    () => game.start(config.tickMs),
    (error: unknown) => {
        logger.fatal({ err: error, host: config.host, port: config.port }, 'Could not bind game server');
        process.exit(1);
    }
).catch((error: unknown) => {
    logger.fatal({ err: error }, 'Simulation crashed');
    process.exit(1);
});

function shutdown(signal: string) {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');
    game.stop();
    server.close().then(
        () => process.exit(0),
        (error: unknown) => {
            logger.error({ err: error }, 'Error closing server');
            process.exit(1);
        }
    );
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
