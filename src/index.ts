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

// Main facade
export { TranscodeService } from './transcodeService';
export type { TranscodeServiceOptions } from './transcodeService';

// Core processors
export { TaskScheduler } from './taskScheduler';
export type { TaskSchedulerOptions, TaskStatus } from './taskScheduler';
export { TranscodeTask, canTransition, isTerminal } from './transcodeTask';
export type { TranscodeTaskOptions } from './transcodeTask';
export { HlsSegmenter, buildManifest, segmentCount } from './hlsSegmenter';
export type { HlsSegmenterOptions } from './hlsSegmenter';
export { EncoderSlots } from './encoderSlots';

// Workflow matching and encoder options
export { evaluate, testCriteria, isWorkflowEligible, validateCriteria, diagnoseCriteria } from './criteria';
export { mergeOptions, buildCommandOptions, validateTarget, encoderOptionsSchema, targetSchema } from './options';

// Encoder boundary
export { FfmpegCommand, createFfmpegFactory, parseProgressLine, runCommand } from './ffmpeg';
export type { EncoderProcess, EncoderFactory, EncoderEventMap } from './ffmpeg';
export { MetadataService, parseProbeOutput } from './metadataService';
export type { ProbeResult, MediaDetails } from './metadataService';

// Storage interfaces for custom implementations
export { MemoryTranscodeStore } from './transcodeStore';
export type { TranscodeStore, Catalog } from './transcodeStore';
export { FileTranscodeStore, catalogSchema } from './fileTranscodeStore';
export { FileStorage } from './fileStorage';
export { MediaSource } from './mediaSource';
export type { OutputLayout } from './mediaSource';

// Configuration and logging
export { defaultConfig, resolveConfig, loadConfig, HLS_SEGMENT_LENGTH } from './config';
export { createLogger } from './logger';
export type { Logger } from './logger';

// Enums
export { TranscodeTaskStatus, CriteriaKey, CriteriaType, CombineType } from './types';

// All type exports
export type {
    LogLevel,

    // Core interfaces
    MediaDescriptor,
    Criteria,
    Workflow,
    EncoderOptions,
    Target,
    FFMPEGOptions,
    Progress,
    EncodeRequest,
    TaskSnapshot,
    TranscodeRecord,
    OrchestratorConfig,
} from './types';
