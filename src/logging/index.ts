// Console and file logging driven by LoggingConfig
import { appendFileSync } from 'fs';
import { LoggingConfig, LogLevel } from '../config';

export interface Logger {
    debug( message: string ): void;
    info( message: string ): void;
    warn( message: string ): void;
    error( message: string ): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

export const silentLogger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined
};

export function createLogger( config: LoggingConfig ): Logger {
    const threshold = LEVEL_ORDER[ config.level ];

    const write = ( level: LogLevel, message: string ): void => {
        if ( LEVEL_ORDER[ level ] < threshold ) {
            return;
        }

        if ( config.enableConsole ) {
            switch ( level ) {
                case 'error':
                    console.error( message );
                    break;
                case 'warn':
                    console.warn( message );
                    break;
                default:
                    console.log( message );
            }
        }

        if ( config.file ) {
            try {
                appendFileSync( config.file, `${new Date().toISOString()} ${level.toUpperCase()} ${message}\n`, 'utf8' );
            } catch ( error ) {
                // Keep logging to the console when the log file becomes unwritable
                console.warn( `Warning: Failed to write log file ${config.file}: ${error instanceof Error ? error.message : 'Unknown error'}` );
            }
        }
    };

    return {
        debug: message => write( 'debug', message ),
        info: message => write( 'info', message ),
        warn: message => write( 'warn', message ),
        error: message => write( 'error', message )
    };
}
