import pino from 'pino';

// ============================================
// Logger Configuration
// ============================================

// LOG_LEVEL is validated by config.ts and applied through setLogLevel()
export const DEFAULT_LOG_LEVEL: pino.LevelWithSilent = 'info';
const IS_TEST = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const IS_DEV = !IS_TEST && process.env.NODE_ENV !== 'production';

/**
 * Create a logger tagged with a component name.
 * Pretty console output in development, JSON lines otherwise, silent under tests.
 */
function createLogger(component: string): pino.Logger {
    const options: pino.LoggerOptions = {
        level: IS_TEST ? 'silent' : DEFAULT_LOG_LEVEL,
        base: { component }
    };

    if (IS_DEV) {
        return pino(options, pino.transport({
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'HH:MM:ss.l',
                ignore: 'pid,hostname'
            }
        }));
    }

    return pino(options);
}

// ============================================
// Logger Instances
// ============================================

// Root logger; game and net code derive child loggers from it
export const logger = createLogger('server');

export const gameLogger = logger.child({ module: 'game' });
export const netLogger = logger.child({ module: 'net' });

// Children keep the level they were created with, so set them all
export function setLogLevel(level: pino.LevelWithSilent) {
    for (const instance of [logger, gameLogger, netLogger]) {
        instance.level = level;
    }
}

// ============================================
// Convenience Methods for Game Events
// ============================================

export function logPlayerConnected(playerId: number, sessionId: string) {
    netLogger.info({ playerId, sessionId, event: 'player_connected' }, 'Player connected');
}

export function logPlayerDisconnected(playerId: number, sessionId: string) {
    netLogger.info({ playerId, sessionId, event: 'player_disconnected' }, 'Player disconnected');
}

export function logPlayerJoined(playerId: number, name: string) {
    gameLogger.info({ playerId, name, event: 'player_joined' }, `Player ${name} joined`);
}

export function logPlayerEaten(playerId: number) {
    gameLogger.info({ playerId, event: 'player_eaten' }, 'Player eaten');
}

export function logServerStarted(host: string, port: number, path: string) {
    logger.info({ host, port, path, event: 'server_started' }, `Game server listening on ws://${host}:${port}${path}`);
}
