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

import * as os from 'os';

import { ExtendedEventEmitter } from './utils';

interface EncoderSlotsEvents {
    'released': { inUse: number, capacity: number };
}

/**
 * EncoderSlots - Caps the number of encoder processes alive at once
 *
 * Queued transcodes take a slot with tryAcquire when one is free, segment encodes
 * wait for one with acquire. A freed slot goes to the longest waiting acquire first,
 * 'released' is only emitted when a slot is left free.
 */
export class EncoderSlots extends ExtendedEventEmitter<EncoderSlotsEvents> {
    private readonly waiters: Array<() => void> = [];

    private inUseCount: number = 0;

    constructor (private maxSlots: number = Math.max(1, os.cpus().length - 1)) {
        super();
        this.maxSlots = Math.max(1, maxSlots);
    }

    get capacity (): number {
        return this.maxSlots;
    }

    get inUse (): number {
        return this.inUseCount;
    }

    get waiting (): number {
        return this.waiters.length;
    }

    /**
     * Takes a slot when one is free
     * @returns false when every slot is taken
     */
    tryAcquire (): boolean {
        if (this.inUseCount >= this.maxSlots) {
            return false;
        }

        this.inUseCount++;

        return true;
    }

    /**
     * Resolves once a slot has been taken on behalf of the caller
     */
    acquire (): Promise<void> {
        if (this.tryAcquire()) {
            return Promise.resolve();
        }

        return new Promise<void>((resolve) => {
            this.waiters.push(resolve);
        });
    }

    release (): void {
        const waiter = this.inUseCount <= this.maxSlots ? this.waiters.shift() : undefined;

        if (waiter) {
            // the slot changes hands without ever being free
            waiter();

            return;
        }

        this.inUseCount = Math.max(0, this.inUseCount - 1);

        if (this.inUseCount < this.maxSlots) {
            this.emit('released', { inUse: this.inUseCount,
                capacity: this.maxSlots });
        }
    }

    /**
     * Changes the number of slots. Slots in use beyond a lowered capacity are only
     * reclaimed as they are released.
     * @param capacity The new number of slots
     */
    setCapacity (capacity: number): void {
        this.maxSlots = Math.max(1, capacity);

        while (this.waiters.length > 0 && this.inUseCount < this.maxSlots) {
            this.inUseCount++;
            this.waiters.shift()?.();
        }

        if (this.inUseCount < this.maxSlots) {
            this.emit('released', { inUse: this.inUseCount,
                capacity: this.maxSlots });
        }
    }
}
