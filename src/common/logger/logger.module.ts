import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WinstonModule } from 'nest-winston';
import * as winston from 'winston';
import { sanitizeFormat } from './log-sanitizer';

/**
 * Winston options for the application logger. JSON lines in production,
 * colorized single lines otherwise.
 */
export function createLoggerOptions(isProduction: boolean): winston.LoggerOptions {
    return {
        level: isProduction ? 'info' : 'debug',
        format: winston.format.combine(
            winston.format.timestamp(),
            sanitizeFormat(),
            isProduction
                ? winston.format.json()
                : winston.format.combine(
                    winston.format.colorize(),
                    winston.format.printf(({ level, message, timestamp, context, ...meta }) => {
                        const ctx = context ? `[${String(context)}]` : '';
                        const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
                        return `${String(timestamp)} ${level} ${ctx} ${String(message)} ${metaStr}`;
                    }),
                ),
        ),
        transports: [new winston.transports.Console()],
    };
}

@Global()
@Module({
    imports: [
        WinstonModule.forRootAsync({
            inject: [ConfigService],
            useFactory: (configService: ConfigService) =>
                createLoggerOptions(configService.get('NODE_ENV') === 'production'),
        }),
    ],
    exports: [WinstonModule],
})
export class LoggerModule { }
