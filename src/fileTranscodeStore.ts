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

import * as path from 'path';

import { TaskEither } from '@eleven-am/fp';
import { z } from 'zod';

import { FileStorage } from './fileStorage';
import { toPathComponent } from './mediaSource';
import { targetSchema } from './options';
import { Catalog, TranscodeStore } from './transcodeStore';
import { CombineType, CriteriaKey, CriteriaType, Target, TranscodeRecord, Workflow } from './types';

const criteriaSchema = z.object({
	id: z.string().min(1),
	workflowId: z.string().min(1),
	key: z.nativeEnum(CriteriaKey),
	type: z.nativeEnum(CriteriaType),
	value: z.string().default(''),
	combineType: z.nativeEnum(CombineType).default(CombineType.AND),
});

const workflowSchema = z.object({
	id: z.string().min(1),
	label: z.string().min(1),
	enabled: z.boolean().default(true),
	criteria: z.array(criteriaSchema).default([]),
	targetIds: z.array(z.string().min(1)),
});

export const catalogSchema = z.object({
	workflows: z.array(workflowSchema).default([]),
	targets: z.array(targetSchema).default([]),
});

const recordSchema = z.object({
	id: z.string().min(1),
	mediaId: z.string().min(1),
	targetId: z.string().min(1),
	outputPath: z.string().min(1),
	completedAt: z.string().datetime(),
});

/**
 * Catalog and records kept as JSON files under one directory:
 * catalog.json holds workflows and targets, records/<mediaId>/<targetId>.json one
 * file per finished transcode
 */
export class FileTranscodeStore implements TranscodeStore {
	constructor (
        private readonly storage: FileStorage,
        private readonly baseDirectory: string,
	) {}

	getWorkflows (): Promise<Workflow[]> {
		return this.readCatalog()
			.map((catalog) => catalog.workflows)
			.toPromise();
	}

	getTarget (targetId: string): Promise<Target | null> {
		return this.readCatalog()
			.map((catalog) => catalog.targets.find((target) => target.id === targetId) ?? null)
			.toPromise();
	}

	getTranscode (mediaId: string, targetId: string): Promise<TranscodeRecord | null> {
		const recordPath = this.getRecordPath(mediaId, targetId);

		return this.storage.exists(recordPath)
			.matchTask([
				{
					predicate: (exists) => exists,
					run: () => this.storage
						.readJson<TranscodeRecord>(recordPath, recordSchema)
						.map((record): TranscodeRecord | null => record),
				},
				{
					predicate: (exists) => !exists,
					run: () => TaskEither.of(null),
				},
			])
			.toPromise();
	}

	saveTranscode (record: TranscodeRecord): Promise<TranscodeRecord> {
		return this.storage
			.writeJson(this.getRecordPath(record.mediaId, record.targetId), record)
			.toPromise();
	}

	/**
     * Reads the catalog, a store without a catalog file has no workflows and no targets
     */
	private readCatalog (): TaskEither<Catalog> {
		const catalogPath = path.join(this.baseDirectory, 'catalog.json');

		return this.storage.exists(catalogPath)
			.matchTask([
				{
					predicate: (exists) => exists,
					run: () => this.storage.readJson<Catalog>(catalogPath, catalogSchema),
				},
				{
					predicate: (exists) => !exists,
					run: () => TaskEither.of<Catalog>({ workflows: [],
						targets: [] }),
				},
			]);
	}

	private getRecordPath (mediaId: string, targetId: string): string {
		return path.join(
			this.baseDirectory,
			'records',
			toPathComponent(mediaId),
			`${toPathComponent(targetId)}.json`,
		);
	}
}
