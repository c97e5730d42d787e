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

import { pairKey } from './utils';
import { Target, TranscodeRecord, Workflow } from './types';

export interface Catalog {
    workflows: Workflow[];
    targets: Target[];
}

export interface TranscodeStore {

    /**
     * Retrieve every workflow, in the order they are evaluated
     */
    getWorkflows(): Promise<Workflow[]>;

    /**
     * Retrieve a target by its ID
     * @param targetId Unique identifier of the target
     */
    getTarget(targetId: string): Promise<Target | null>;

    /**
     * Retrieve the record of a finished transcode, null when the pair was never completed
     * @param mediaId Unique identifier of the media
     * @param targetId Unique identifier of the target
     */
    getTranscode(mediaId: string, targetId: string): Promise<TranscodeRecord | null>;

    /**
     * Save the record of a finished transcode
     * @param record The record to save
     */
    saveTranscode(record: TranscodeRecord): Promise<TranscodeRecord>;
}

export class MemoryTranscodeStore implements TranscodeStore {
	private readonly workflows: Workflow[];

	private readonly targets = new Map<string, Target>();

	private readonly records = new Map<string, TranscodeRecord>();

	constructor (catalog: Partial<Catalog> = {}) {
		this.workflows = [...catalog.workflows ?? []];
		catalog.targets?.forEach((target) => this.targets.set(target.id, target));
	}

	getWorkflows (): Promise<Workflow[]> {
		return Promise.resolve([...this.workflows]);
	}

	getTarget (targetId: string): Promise<Target | null> {
		return Promise.resolve(this.targets.get(targetId) ?? null);
	}

	getTranscode (mediaId: string, targetId: string): Promise<TranscodeRecord | null> {
		return Promise.resolve(this.records.get(pairKey(mediaId, targetId)) ?? null);
	}

	saveTranscode (record: TranscodeRecord): Promise<TranscodeRecord> {
		this.records.set(pairKey(record.mediaId, record.targetId), record);

		return Promise.resolve(record);
	}
}
