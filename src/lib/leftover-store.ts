/**
 * Leftover Fragment Storage
 * Holds the partly-used remainders of retired vials that can still serve
 * the smaller doses on the roster.
 *
 * Usage:
 *   const store = createLeftoverStore('single-slot');
 *   const wasted = store.draw(dose, minDosage); // null when nothing fits
 */

import type { LeftoverFragment, LeftoverPolicy } from '@/types/simulation';

export interface LeftoverStore {
    policy: LeftoverPolicy;

    /**
     * Serve one dose from a retained fragment. Returns null if no fragment
     * covers it, otherwise the volume thrown away because the fragment
     * dropped below `minDosage`.
     */
    draw(dose: number, minDosage: number): number | null;

    /** Keep a fragment. Returns the volume it displaced. */
    retain(amount: number): number;

    /** Usable volume still held */
    total(): number;

    snapshot(): LeftoverFragment[];
}

// ── Single slot ─────────────────────────────────────────────────

export class SingleSlotLeftover implements LeftoverStore {
    policy: LeftoverPolicy = 'single-slot';
    private slot: LeftoverFragment = { amount: 0, active: false };

    draw(dose: number, minDosage: number): number | null {
        if (!this.slot.active || this.slot.amount - dose < 0) return null;
        this.slot.amount = this.slot.amount - dose;
        if (this.slot.amount - minDosage < 0) {
            this.slot.active = false;
            return this.slot.amount;
        }
        return 0;
    }

    // A new fragment replaces the active one outright.
    retain(amount: number): number {
        const displaced = this.slot.active ? this.slot.amount : 0;
        this.slot = { amount, active: true };
        return displaced;
    }

    total(): number {
        return this.slot.active ? this.slot.amount : 0;
    }

    snapshot(): LeftoverFragment[] {
        return this.slot.active ? [{ ...this.slot }] : [];
    }
}

// ── Fragment pool ───────────────────────────────────────────────

export class FragmentPool implements LeftoverStore {
    policy: LeftoverPolicy = 'fragment-pool';
    private amounts: number[] = [];

    draw(dose: number, minDosage: number): number | null {
        // Smallest fragment that still covers the dose; earliest wins ties
        let pick = -1;
        this.amounts.forEach((amount, i) => {
            if (amount - dose >= 0 && (pick < 0 || amount < this.amounts[pick])) pick = i;
        });
        if (pick < 0) return null;

        const rest = this.amounts[pick] - dose;
        if (rest - minDosage < 0) {
            this.amounts.splice(pick, 1);
            return rest;
        }
        this.amounts[pick] = rest;
        return 0;
    }

    retain(amount: number): number {
        this.amounts.push(amount);
        return 0;
    }

    total(): number {
        return this.amounts.reduce((sum, a) => sum + a, 0);
    }

    snapshot(): LeftoverFragment[] {
        return this.amounts.map(amount => ({ amount, active: true }));
    }
}

export function createLeftoverStore(policy: LeftoverPolicy): LeftoverStore {
    switch (policy) {
        case 'single-slot': return new SingleSlotLeftover();
        case 'fragment-pool': return new FragmentPool();
    }
}
