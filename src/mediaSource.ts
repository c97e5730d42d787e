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

import { FileStorage } from './fileStorage';
import { MediaDescriptor, Target } from './types';

export interface OutputLayout {
    outputDirectory: string;
    streamDirectory: string;
}

// ids end up as path components
export const toPathComponent = (id: string) => id.replace(/[^A-Za-z0-9._-]/g, '_').replace(/^\.+$/, '_');

export class MediaSource {
	constructor (
        private readonly media: MediaDescriptor,
        private readonly storage: FileStorage,
        private readonly layout: OutputLayout,
	) {}

	getMedia (): MediaDescriptor {
		return this.media;
	}

	/**
     * Where the full transcode of this media for a target is written
     * @param target The target being produced
     */
	getTranscodePath (target: Target): string {
		return path.join(
			this.layout.outputDirectory,
			toPathComponent(this.media.id),
			`${toPathComponent(target.id)}.${target.extension}`,
		);
	}

	/**
     * The directory holding every stream artifact of this media
     */
	getMediaStreamDirectory (): string {
		return path.join(this.layout.streamDirectory, toPathComponent(this.media.id));
	}

	/**
     * Retrieves the segment directory for a target, creating it when missing
     * @param target The target the segments are encoded with
     */
	getStreamDirectory (target: Target): TaskEither<string> {
		return this.storage.ensureDirectoryExists(this.getTargetStreamDirectory(target));
	}

	/**
     * Retrieves the path of a segment in the storage
     * @param target The target the segment is encoded with
     * @param segmentNumber The zero based index of the segment
     */
	getSegmentPath (target: Target, segmentNumber: number): string {
		return path.join(this.getTargetStreamDirectory(target), `${segmentNumber}.ts`);
	}

	/**
     * Scratch playlist the encoder writes next to a segment, one per segment so
     * concurrent segment encodes never share an output path
     */
	getSegmentPlaylistPath (target: Target, segmentNumber: number): string {
		return path.join(this.getTargetStreamDirectory(target), `${segmentNumber}.m3u8`);
	}

	/**
     * Checks if a segment exists in the storage
     * @param target The target the segment is encoded with
     * @param segmentNumber The zero based index of the segment
     */
	segmentExist (target: Target, segmentNumber: number): TaskEither<boolean> {
		return this.storage.exists(this.getSegmentPath(target, segmentNumber));
	}

	/**
     * Deletes the stream files generated for this media
     */
	deleteStreamFiles (): TaskEither<void> {
		return this.storage.deleteDirectory(this.getMediaStreamDirectory());
	}

	private getTargetStreamDirectory (target: Target): string {
		return path.join(this.getMediaStreamDirectory(), toPathComponent(target.id));
	}
}
