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

import { createBadRequestError, TaskEither } from '@eleven-am/fp';

import { CombineType, Criteria, CriteriaKey, CriteriaType, MediaDescriptor, Workflow } from './types';

type AttributeKind = 'text' | 'number';

type Attribute = { kind: 'text', value: string } | { kind: 'number', value: number } | null;

const KEY_KINDS: Record<CriteriaKey, AttributeKind> = {
    [CriteriaKey.TITLE]: 'text',
    [CriteriaKey.RESOLUTION]: 'text',
    [CriteriaKey.CODEC]: 'text',
    [CriteriaKey.CONTAINER]: 'text',
    [CriteriaKey.SOURCE_PATH]: 'text',
    [CriteriaKey.SOURCE_NAME]: 'text',
    [CriteriaKey.SOURCE_EXTENSION]: 'text',
    [CriteriaKey.DURATION]: 'number',
    [CriteriaKey.WIDTH]: 'number',
    [CriteriaKey.HEIGHT]: 'number',
    [CriteriaKey.SEASON_NUMBER]: 'number',
    [CriteriaKey.EPISODE_NUMBER]: 'number',
};

const TYPE_KINDS: Record<CriteriaType, AttributeKind[]> = {
    [CriteriaType.EQUALS]: ['text', 'number'],
    [CriteriaType.NOT_EQUALS]: ['text', 'number'],
    [CriteriaType.MATCHES]: ['text'],
    [CriteriaType.DOES_NOT_MATCH]: ['text'],
    [CriteriaType.LESS_THAN]: ['number'],
    [CriteriaType.GREATER_THAN]: ['number'],
    [CriteriaType.IS_PRESENT]: ['text', 'number'],
    [CriteriaType.IS_NOT_PRESENT]: ['text', 'number'],
};

const text = (value: string | undefined): Attribute => value === undefined || value === '' ? null : { kind: 'text', value };

const num = (value: number | undefined): Attribute => value === undefined || !Number.isFinite(value) ? null : { kind: 'number', value };

function resolutionOf (media: MediaDescriptor): string | undefined {
    if (media.resolution) {
        return media.resolution;
    }

    return media.height === undefined ? undefined : `${media.height}p`;
}

/**
 * Reads the attribute a criteria key refers to from the media
 * @param media The media to read from
 * @param key The attribute to read
 */
export function resolveAttribute (media: MediaDescriptor, key: CriteriaKey): Attribute {
    switch (key) {
        case CriteriaKey.TITLE:
            return text(media.title);
        case CriteriaKey.RESOLUTION:
            return text(resolutionOf(media));
        case CriteriaKey.CODEC:
            return text(media.codec);
        case CriteriaKey.CONTAINER:
            return text(media.container);
        case CriteriaKey.SOURCE_PATH:
            return text(media.sourcePath);
        case CriteriaKey.SOURCE_NAME:
            return text(path.basename(media.sourcePath));
        case CriteriaKey.SOURCE_EXTENSION:
            return text(path.extname(media.sourcePath));
        case CriteriaKey.DURATION:
            return num(media.duration);
        case CriteriaKey.WIDTH:
            return num(media.width);
        case CriteriaKey.HEIGHT:
            return num(media.height);
        case CriteriaKey.SEASON_NUMBER:
            return num(media.seasonNumber);
        case CriteriaKey.EPISODE_NUMBER:
            return num(media.episodeNumber);
        default:
            return null;
    }
}

function parseNumber (value: string): number | null {
    if (value.trim() === '') {
        return null;
    }

    const parsed = Number(value);

    return Number.isFinite(parsed) ? parsed : null;
}

function compilePattern (value: string): RegExp | null {
    if (value.length < 2 || !value.startsWith('/') || !value.endsWith('/')) {
        return null;
    }

    try {
        return new RegExp(value.slice(1, -1));
    } catch {
        return null;
    }
}

function matchesText (actual: string, value: string): boolean | null {
    if (value.length >= 2 && value.startsWith('/') && value.endsWith('/')) {
        const pattern = compilePattern(value);

        return pattern ? pattern.test(actual) : null;
    }

    return actual === value;
}

function compare (attribute: Exclude<Attribute, null>, type: CriteriaType, value: string): boolean | null {
    if (attribute.kind === 'text') {
        switch (type) {
            case CriteriaType.EQUALS:
                return attribute.value === value;
            case CriteriaType.NOT_EQUALS:
                return attribute.value !== value;
            case CriteriaType.MATCHES:
                return matchesText(attribute.value, value);
            case CriteriaType.DOES_NOT_MATCH: {
                const matched = matchesText(attribute.value, value);

                return matched === null ? null : !matched;
            }
            default:
                return null;
        }
    }

    const expected = parseNumber(value);

    if (expected === null) {
        return null;
    }

    switch (type) {
        case CriteriaType.EQUALS:
            return attribute.value === expected;
        case CriteriaType.NOT_EQUALS:
            return attribute.value !== expected;
        case CriteriaType.LESS_THAN:
            return attribute.value < expected;
        case CriteriaType.GREATER_THAN:
            return attribute.value > expected;
        default:
            return null;
    }
}

/**
 * Tests one criteria against the media. An illegal key/type pair, an absent attribute or
 * a value that cannot be read all give false rather than an error.
 * @param media The media to test
 * @param criteria The criteria to apply
 */
export function testCriteria (media: MediaDescriptor, criteria: Criteria): boolean {
    const kind = KEY_KINDS[criteria.key];
    const accepted = TYPE_KINDS[criteria.type];

    if (kind === undefined || accepted === undefined || !accepted.includes(kind)) {
        return false;
    }

    const attribute = resolveAttribute(media, criteria.key);

    if (criteria.type === CriteriaType.IS_PRESENT) {
        return attribute !== null;
    }

    if (criteria.type === CriteriaType.IS_NOT_PRESENT) {
        return attribute === null;
    }

    if (attribute === null) {
        return false;
    }

    return compare(attribute, criteria.type, criteria.value) ?? false;
}

/**
 * Folds a criteria list left to right, each entry combines with everything before it
 * using its own combine type: (((c0) op1 c1) op2 c2). An empty list imposes no constraint.
 * @param media The media to evaluate
 * @param criteriaList The ordered criteria of a workflow
 */
export function evaluate (media: MediaDescriptor, criteriaList: Criteria[]): boolean {
    if (criteriaList.length === 0) {
        return true;
    }

    const [first, ...rest] = criteriaList;

    return rest.reduce(
        (accumulator, criteria) => {
            const result = testCriteria(media, criteria);

            return criteria.combineType === CombineType.OR
                ? accumulator || result
                : accumulator && result;
        },
        testCriteria(media, first),
    );
}

export function isWorkflowEligible (workflow: Workflow, media: MediaDescriptor): boolean {
    return workflow.enabled && evaluate(media, workflow.criteria);
}

/**
 * Describes why a criteria can never match, or null when it is legal
 * @param criteria The criteria to inspect
 */
export function describeCriteriaProblem (criteria: Criteria): string | null {
    const kind = KEY_KINDS[criteria.key];
    const accepted = TYPE_KINDS[criteria.type];

    if (kind === undefined) {
        return `criteria ${criteria.id} uses unknown key ${criteria.key}`;
    }

    if (accepted === undefined) {
        return `criteria ${criteria.id} uses unknown type ${criteria.type}`;
    }

    if (!accepted.includes(kind)) {
        return `criteria ${criteria.id}: key ${criteria.key} does not accept type ${criteria.type}`;
    }

    if (criteria.type === CriteriaType.IS_PRESENT || criteria.type === CriteriaType.IS_NOT_PRESENT) {
        return null;
    }

    if (kind === 'number' && parseNumber(criteria.value) === null) {
        return `criteria ${criteria.id}: type ${criteria.type} expects a number, '${criteria.value}' is not one`;
    }

    if (kind === 'text' && criteria.value === '') {
        return `criteria ${criteria.id}: type ${criteria.type} expects a non-empty value`;
    }

    if (kind === 'text' && criteria.value.startsWith('/') && criteria.value.endsWith('/') && criteria.value.length >= 2 && !compilePattern(criteria.value)) {
        return `criteria ${criteria.id}: '${criteria.value}' is not a valid regular expression`;
    }

    return null;
}

export function validateCriteria (criteria: Criteria): TaskEither<Criteria> {
    const problem = describeCriteriaProblem(criteria);

    return problem === null
        ? TaskEither.of(criteria)
        : TaskEither.error(createBadRequestError(problem));
}

export function diagnoseCriteria (criteriaList: Criteria[]): string[] {
    return criteriaList
        .map((criteria) => describeCriteriaProblem(criteria))
        .filter((problem): problem is string => problem !== null);
}
