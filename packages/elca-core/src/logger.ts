// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

export enum LogLevel {
    Debug = 0,
    Info = 1,
    Warn = 2,
    Error = 3,
    Silent = 4,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
    debug: LogLevel.Debug,
    info: LogLevel.Info,
    warn: LogLevel.Warn,
    error: LogLevel.Error,
    silent: LogLevel.Silent,
};

export class Logger {
    static level: LogLevel = LogLevel.Info;
    static prefix = "[eLCA]";

    static parseLevel(name: string | undefined): LogLevel | undefined {
        if (!name) return undefined;
        return LEVEL_NAMES[name.trim().toLowerCase()];
    }

    static debug(message: string, ...optionalParams: unknown[]) {
        if (Logger.level <= LogLevel.Debug) {
            console.debug(`${Logger.prefix} ${message}`, ...optionalParams);
        }
    }

    static info(message: string, ...optionalParams: unknown[]) {
        if (Logger.level <= LogLevel.Info) {
            console.info(`${Logger.prefix} ${message}`, ...optionalParams);
        }
    }

    static warn(message: string, ...optionalParams: unknown[]) {
        if (Logger.level <= LogLevel.Warn) {
            console.warn(`${Logger.prefix} ${message}`, ...optionalParams);
        }
    }

    static error(message: string, ...optionalParams: unknown[]) {
        if (Logger.level <= LogLevel.Error) {
            console.error(`${Logger.prefix} ${message}`, ...optionalParams);
        }
    }
}
