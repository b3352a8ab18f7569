// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { existsSync, readFileSync } from "node:fs";
import Ajv from "ajv";
import { LogLevel, Logger, Result, errorMessage } from "elca-core";
import type { MatchStrategy } from "elca-report";
import { DEFAULT_PROVENANCE, type IIfcLibraryProvenance } from "ifc-library-core";

export const LOG_LEVEL_ENV = "ELCA_LOG_LEVEL";

export const MATCH_STRATEGIES: readonly MatchStrategy[] = ["name", "assembly-and-name"];

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

export interface IElcaConfig extends IIfcLibraryProvenance {
    projectName: string;
    libraryVersion: string;
    matchStrategy: MatchStrategy;
    csvDelimiter: string;
    logLevel: LogLevelName;
}

export const DEFAULT_CONFIG: IElcaConfig = {
    ...DEFAULT_PROVENANCE,
    projectName: "eLCA Material Library",
    libraryVersion: "1.0",
    matchStrategy: "name",
    csvDelimiter: ",",
    logLevel: "info",
};

const nonEmptyString = { type: "string", minLength: 1 } as const;

const CONFIG_FILE_SCHEMA = {
    type: "object",
    additionalProperties: false,
    properties: {
        organization: nonEmptyString,
        applicationName: nonEmptyString,
        applicationIdentifier: nonEmptyString,
        applicationVersion: nonEmptyString,
        personFamilyName: nonEmptyString,
        personGivenName: nonEmptyString,
        projectName: nonEmptyString,
        libraryVersion: nonEmptyString,
        matchStrategy: { enum: MATCH_STRATEGIES },
        csvDelimiter: { type: "string", minLength: 1, maxLength: 1 },
        logLevel: { enum: LOG_LEVEL_NAMES },
    },
} as const;

export interface IConfigSources {
    /** JSON file holding any subset of {@link IElcaConfig}. */
    configPath?: string;
    /** Values from command line flags; only keys present take effect. */
    overrides?: Partial<IElcaConfig>;
    env?: NodeJS.ProcessEnv;
}

/**
 * Resolves settings from defaults, then the config file, then flags, then
 * the environment. Only the log level is read from the environment.
 */
export function loadConfig(sources: IConfigSources = {}): Result<IElcaConfig> {
    let config: IElcaConfig = { ...DEFAULT_CONFIG };

    if (sources.configPath !== undefined) {
        const file = readConfigFile(sources.configPath);
        if (!file.isOk) return file;
        config = { ...config, ...file.value };
    }

    config = { ...config, ...sources.overrides };

    const envLevel = (sources.env ?? process.env)[LOG_LEVEL_ENV];
    if (envLevel !== undefined && envLevel.length > 0) {
        const level = envLevel.trim().toLowerCase();
        if (!isLogLevelName(level)) {
            return Result.err(`Invalid ${LOG_LEVEL_ENV} '${envLevel}', expected one of ${LOG_LEVEL_NAMES.join(", ")}`);
        }
        config.logLevel = level;
    }

    return Result.ok(config);
}

export function readConfigFile(path: string): Result<Partial<IElcaConfig>> {
    if (!existsSync(path)) {
        return Result.err(`Config file not found: ${path}`);
    }

    let data: unknown;
    try {
        data = JSON.parse(readFileSync(path, "utf-8"));
    } catch (e) {
        return Result.err(`Config file ${path} is not valid JSON: ${errorMessage(e)}`);
    }

    const ajv = new Ajv({ allErrors: true });
    const validate = ajv.compile<Partial<IElcaConfig>>(CONFIG_FILE_SCHEMA);
    if (!validate(data)) {
        return Result.err(`Invalid config file ${path}: ${ajv.errorsText(validate.errors)}`);
    }
    return Result.ok(data);
}

export function applyLogLevel(config: IElcaConfig) {
    Logger.level = Logger.parseLevel(config.logLevel) ?? LogLevel.Info;
}

export function isMatchStrategy(value: unknown): value is MatchStrategy {
    return MATCH_STRATEGIES.some((x) => x === value);
}

export function isLogLevelName(value: unknown): value is LogLevelName {
    return LOG_LEVEL_NAMES.some((x) => x === value);
}

export function provenanceOf(config: IElcaConfig): IIfcLibraryProvenance {
    return {
        organization: config.organization,
        applicationName: config.applicationName,
        applicationIdentifier: config.applicationIdentifier,
        applicationVersion: config.applicationVersion,
        personFamilyName: config.personFamilyName,
        personGivenName: config.personGivenName,
    };
}
