/*
 * transcode-orchestrator
 * Copyright (C) 2025 Roy OSSAI
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program.  If not, see <https://www.gnu.org/licenses/>.
 */

import { LogLevel } from './types';

export interface Logger {
    debug(message: string, ...meta: unknown[]): void;
    info(message: string, ...meta: unknown[]): void;
    warn(message: string, ...meta: unknown[]): void;
    error(message: string, ...meta: unknown[]): void;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

/**
 * Console backed logger, every line is prefixed with the scope of the component that wrote it
 * @param scope Name of the component, e.g. TaskScheduler
 * @param level Lowest level that is written
 */
export function createLogger (scope: string, level: LogLevel = 'info'): Logger {
    const enabled = (candidate: LogLevel) => LEVEL_WEIGHT[candidate] >= LEVEL_WEIGHT[level];
    const prefix = `[${scope}]`;

    return {
        debug: (message, ...meta) => {
            if (enabled('debug')) {
                console.debug(prefix, message, ...meta);
            }
        },
        info: (message, ...meta) => {
            if (enabled('info')) {
                console.log(prefix, message, ...meta);
            }
        },
        warn: (message, ...meta) => {
            if (enabled('warn')) {
                console.warn(prefix, message, ...meta);
            }
        },
        error: (message, ...meta) => {
            if (enabled('error')) {
                console.error(prefix, message, ...meta);
            }
        },
    };
}
