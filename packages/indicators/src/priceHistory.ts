import type { PriceSample } from "@tickloop/core";
import { typicalPrice } from "./cci";

/**
 * Bounded FIFO of accepted samples; the oldest is evicted once `capacity` is
 * reached.
 */
export class PriceHistory {
	private readonly samples: PriceSample[] = [];

	constructor(readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity <= 0) {
			throw new RangeError(`PriceHistory capacity must be a positive integer, got ${capacity}`);
		}
	}

	get length(): number {
		return this.samples.length;
	}

	push(sample: PriceSample): void {
		this.samples.push(sample);
		if (this.samples.length > this.capacity) {
			this.samples.shift();
		}
	}

	last(): PriceSample | undefined {
		return this.samples[this.samples.length - 1];
	}

	values(): readonly PriceSample[] {
		return this.samples;
	}

	prices(): number[] {
		return this.samples.map((sample) => sample.price);
	}

	typicalPrices(): number[] {
		return this.samples.map(typicalPrice);
	}

	clear(): void {
		this.samples.length = 0;
	}
}
