import {promises as fs} from "fs";
import * as path from "path";

import {ConfigError, FileSystemError} from "../utils/errors.js";
import {stripTrailingSeparators} from "../utils/validation.js";
import {CONFIG_DEFAULTS, ENV_VARS, VCS_MARKERS} from "./constants.js";
import type {RootscoutConfig} from "./types.js";

/**
 * Get the default configuration
 */
export function getDefaultConfig(): RootscoutConfig {
    return {
        version: CONFIG_DEFAULTS.VERSION,
        vcsMarkers: [...VCS_MARKERS],
        markers: [".git/"],
        fallbackToCwd: false,
    };
}

/**
 * Load the rootscout configuration.
 *
 * The file is taken from `configPath`, then the ROOTSCOUT_CONFIG variable,
 * then `.rootscout.json` in the current directory. A missing default file
 * yields the defaults; a missing file that was asked for by name is an
 * error. Environment overrides are applied last.
 * @throws {ConfigError} When the file is missing, not JSON, or malformed
 */
export async function loadConfig(
    configPath?: string,
    env: NodeJS.ProcessEnv = process.env,
): Promise<RootscoutConfig> {
    const explicitPath = configPath ?? env[ENV_VARS.CONFIG_PATH];
    const filePath = path.resolve(explicitPath ?? path.join(process.cwd(), CONFIG_DEFAULTS.CONFIG_FILE));

    let fileConfig: Partial<RootscoutConfig> = {};
    try {
        const content = await fs.readFile(filePath, "utf-8");
        const data: unknown = JSON.parse(content);

        if (!validateConfig(data)) {
            throw new ConfigError("Invalid configuration format", {path: filePath});
        }

        fileConfig = data;
    } catch(error) {
        if (error && typeof error === "object" && "code" in error && error.code === "ENOENT") {
            if (explicitPath !== undefined) {
                throw new ConfigError(`Configuration file not found: ${filePath}`);
            }
        } else if (error instanceof ConfigError) {
            throw error;
        } else if (error instanceof SyntaxError) {
            throw new ConfigError("Invalid JSON in configuration file", error);
        } else {
            throw new FileSystemError(
                `Failed to read configuration: ${error instanceof Error ? error.message : String(error)}`,
            );
        }
    }

    return applyEnvOverrides({...getDefaultConfig(), ...fileConfig}, env);
}

/**
 * Replace configured values with those set in the environment
 * @throws {ConfigError} When ROOTSCOUT_VCS_MARKERS names no usable marker
 */
export function applyEnvOverrides(config: RootscoutConfig, env: NodeJS.ProcessEnv = process.env): RootscoutConfig {
    const raw = env[ENV_VARS.VCS_MARKERS];
    if (raw === undefined || raw.trim() === "") {
        return config;
    }

    const vcsMarkers = raw.split(",").map((marker) => marker.trim()).filter((marker) => marker !== "");
    if (!isMarkerList(vcsMarkers)) {
        throw new ConfigError(`Invalid ${ENV_VARS.VCS_MARKERS}: "${raw}"`);
    }

    return {...config, vcsMarkers};
}

/**
 * Validate that an unknown object is a (possibly partial) RootscoutConfig
 * @param config The object to validate
 * @returns True if valid, false otherwise
 */
export function validateConfig(config: unknown): config is Partial<RootscoutConfig> {
    if (!config || typeof config !== "object" || Array.isArray(config)) {
        return false;
    }

    const obj = config as Record<string, unknown>;

    if (obj.version !== undefined && typeof obj.version !== "string") {
        return false;
    }

    if (obj.vcsMarkers !== undefined && !isMarkerList(obj.vcsMarkers)) {
        return false;
    }

    if (obj.markers !== undefined && !isMarkerList(obj.markers)) {
        return false;
    }

    if (obj.fallbackToCwd !== undefined && typeof obj.fallbackToCwd !== "boolean") {
        return false;
    }

    return true;
}

function isMarkerList(value: unknown): value is string[] {
    return Array.isArray(value) &&
        value.length > 0 &&
        value.every((marker) => typeof marker === "string" && stripTrailingSeparators(marker) !== "");
}
