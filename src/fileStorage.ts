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

import * as fs from 'fs';
import * as pfs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import { createBadRequestError, createNotFoundError, createUnknownError, Either, TaskEither } from '@eleven-am/fp';
import { ZodType, ZodTypeDef } from 'zod';

/**
 * The temp directory of the platform with symlinks resolved, ffmpeg refuses some
 * symlinked output paths (macOS puts /var under /private)
 */
export function resolveTempRoot (): string {
    return fs.realpathSync(os.tmpdir());
}

export class FileStorage {
    /**
     * Checks if a file exists at the specified path.
     * @param path The path to check.
     * @returns A TaskEither containing true if the file exists, false otherwise.
     */
    exists (path: string): TaskEither<boolean> {
        return TaskEither
            .tryCatch(
                () => pfs.stat(path),
                'Failed to check file existence',
            )
            .map((stat) => stat.isFile())
            .orElse(() => TaskEither.of(false));
    }

    /**
     * Deletes a file at the specified path, a file that is already gone is not an error.
     * @param path The path to the file to delete.
     */
    deleteFile (path: string): TaskEither<void> {
        return TaskEither
            .tryCatch(
                () => pfs.rm(path, { force: true }),
                (err) => createUnknownError(`Failed to delete file ${path}`)(err),
            );
    }

    /**
     * Removes a directory and everything below it.
     * @param directory The directory to remove.
     */
    deleteDirectory (directory: string): TaskEither<void> {
        return TaskEither
            .tryCatch(
                () => pfs.rm(directory, { recursive: true, force: true }),
                (err) => createUnknownError(`Failed to delete directory ${directory}`)(err),
            );
    }

    /**
     * Lists all files below the given directory.
     * @param directory The directory to walk.
     */
    listFiles (directory: string): TaskEither<string[]> {
        const itemStats = (item: string) => TaskEither
            .tryCatch(
                () => pfs.stat(item),
                'Failed to get file stats',
            )
            .map((stat) => ({
                path: item,
                isDirectory: stat.isDirectory(),
            }))
            .matchTask([
                {
                    predicate: (item) => item.isDirectory,
                    // eslint-disable-next-line @typescript-eslint/no-use-before-define
                    run: (item) => readDir(item.path),
                },
                {
                    predicate: (item) => !item.isDirectory,
                    run: (item) => TaskEither.of([item.path]),
                },
            ]);

        const readDir = (dir: string): TaskEither<string[]> => TaskEither
            .tryCatch(
                () => pfs.readdir(dir),
                'Failed to read directory',
            )
            .map((entries) => entries.map((entry) => path.join(dir, entry)))
            .chainItems(itemStats)
            .map((items) => items.flat());

        return readDir(directory);
    }

    /**
     * Ensures that the directory for a given path exists.
     * @param directory The path of the directory to create.
     * @returns A TaskEither containing the path if successful, or a resource error.
     */
    ensureDirectoryExists (directory: string): TaskEither<string> {
        return TaskEither
            .tryCatch(
                () => pfs.mkdir(directory, { recursive: true }),
                (err) => createUnknownError(`Failed to create directory ${directory}`)(err),
            )
            .map(() => directory);
    }

    /**
     * Reads and validates a JSON document.
     * @param filePath The file to read.
     * @param schema Schema the parsed document must satisfy.
     */
    readJson<T> (filePath: string, schema: ZodType<T, ZodTypeDef, unknown>): TaskEither<T> {
        return this.exists(filePath)
            .filter(
                (exists) => exists,
                () => createNotFoundError(`File not found: ${filePath}`),
            )
            .chain(() => TaskEither
                .tryCatch(
                    () => pfs.readFile(filePath, 'utf8'),
                    'Failed to read file',
                ))
            .chain((content) => Either
                .tryCatch(
                    (): unknown => JSON.parse(content),
                    `File ${filePath} does not contain valid JSON`,
                )
                .toTaskEither())
            .chain((json) => {
                const parsed = schema.safeParse(json);

                if (parsed.success) {
                    return TaskEither.of(parsed.data);
                }

                const issues = parsed.error.issues
                    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
                    .join('; ');

                return TaskEither.error<T>(createBadRequestError(`Invalid content in ${filePath}: ${issues}`));
            });
    }

    /**
     * Writes a value as a JSON document, creating the parent directory when needed.
     * @param filePath The destination path.
     * @param value The value to serialise.
     */
    writeJson<T> (filePath: string, value: T): TaskEither<T> {
        return this.ensureDirectoryExists(path.dirname(filePath))
            .chain(() => TaskEither
                .tryCatch(
                    () => pfs.writeFile(filePath, JSON.stringify(value, null, 2), 'utf8'),
                    (err) => createUnknownError(`Failed to write file ${filePath}`)(err),
                ))
            .map(() => value);
    }
}
