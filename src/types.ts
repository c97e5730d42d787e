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

export enum TranscodeTaskStatus {
    WAITING = 'WAITING',
    WORKING = 'WORKING',
    SUSPENDED = 'SUSPENDED',
    TROUBLED = 'TROUBLED',
    CANCELLED = 'CANCELLED',
    COMPLETE = 'COMPLETE',
}

export enum CriteriaKey {
    TITLE = 'TITLE',
    RESOLUTION = 'RESOLUTION',
    CODEC = 'CODEC',
    CONTAINER = 'CONTAINER',
    SOURCE_PATH = 'SOURCE_PATH',
    SOURCE_NAME = 'SOURCE_NAME',
    SOURCE_EXTENSION = 'SOURCE_EXTENSION',
    DURATION = 'DURATION',
    WIDTH = 'WIDTH',
    HEIGHT = 'HEIGHT',
    SEASON_NUMBER = 'SEASON_NUMBER',
    EPISODE_NUMBER = 'EPISODE_NUMBER',
}

export enum CriteriaType {
    EQUALS = 'EQUALS',
    NOT_EQUALS = 'NOT_EQUALS',
    MATCHES = 'MATCHES',
    DOES_NOT_MATCH = 'DOES_NOT_MATCH',
    LESS_THAN = 'LESS_THAN',
    GREATER_THAN = 'GREATER_THAN',
    IS_PRESENT = 'IS_PRESENT',
    IS_NOT_PRESENT = 'IS_NOT_PRESENT',
}

export enum CombineType {
    AND = 'AND',
    OR = 'OR',
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface MediaDescriptor {
    id: string;
    sourcePath: string;
    duration: number;
    title?: string;
    width?: number;
    height?: number;
    resolution?: string;
    codec?: string;
    container?: string;
    seasonNumber?: number;
    episodeNumber?: number;
}

export interface Criteria {
    id: string;
    workflowId: string;
    key: CriteriaKey;
    type: CriteriaType;
    value: string;
    combineType: CombineType;
}

export interface Workflow {
    id: string;
    label: string;
    enabled: boolean;
    criteria: Criteria[];
    targetIds: string[];
}

/**
 * Sparse set of encoder parameters, an unset field leaves the decision to the encoder
 */
export interface EncoderOptions {
    outputFormat?: string;
    videoCodec?: string;
    audioCodec?: string;
    videoBitrate?: string;
    audioBitrate?: string;
    preset?: string;
    crf?: number;
    resolution?: string;
    frameRate?: number;
    threads?: number;
    videoFilter?: string;
    seekTime?: number;
    duration?: number;
    hlsSegmentDuration?: number;
    hlsPlaylistType?: 'vod' | 'event';
    hlsListSize?: number;
    hlsSegmentFilename?: string;
    startNumber?: number;
    overwrite?: boolean;
    extraArgs?: Record<string, string | number>;
}

export interface Target {
    id: string;
    label: string;
    extension: string;
    options: EncoderOptions;
}

export interface FFMPEGOptions {
    inputOptions: string[];
    outputOptions: string[];
    videoFilters: string | undefined;
}

export interface Progress {
    fraction: number;
    processedSeconds: number;
    speed: number | null;
    etaSeconds: number | null;
    frames: number | null;
    bitrate: string | null;
}

export interface EncodeRequest {
    sourcePath: string;
    outputPath: string;
    options: EncoderOptions;
    expectedDuration: number;
}

export interface TaskSnapshot {
    id: string;
    mediaId: string;
    targetId: string;
    status: TranscodeTaskStatus;
    outputPath: string;
    progress: Progress | null;
    trouble: string | null;
}

export interface TranscodeRecord {
    id: string;
    mediaId: string;
    targetId: string;
    outputPath: string;
    completedAt: string;
}

export interface OrchestratorConfig {
    maxConcurrentTasks: number;
    maxQueueSize: number;
    outputDirectory: string;
    streamDirectory: string;
    ffmpegPath: string;
    ffprobePath: string;
    commandTimeoutMs: number;
    segmentLength: number;
    segmentTimeoutMs: number;
    segmentPollIntervalMs: number;
    logLevel: LogLevel;
}
