import pino from 'pino';

// Records go to stdout, so logs always go to stderr
export function createLogger(options: { level?: string; pretty?: boolean } = {}): pino.Logger {
    const level = options.level ?? process.env.LOG_LEVEL ?? 'info';

    if (options.pretty) {
        return pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    destination: 2,
                },
            },
        });
    }

    return pino({ level }, pino.destination(2));
}

export const logger = createLogger();
