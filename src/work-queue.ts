import { QueueClosedError } from './errors';

interface PendingPut<T> {
	item: T;
	resolve: () => void;
	reject: (err: Error) => void;
}

/**
 * Bounded FIFO queue with waiting producers and consumers
 *
 * `put` stays pending while the queue is full, `take` while it is empty.
 * An item is handed to exactly one taker.
 *
 * @template T - item type
 */
export class WorkQueue<T extends object> {
	private readonly items: T[] = [];
	private readonly takers: ((item: T | undefined) => void)[] = [];
	private readonly putters: PendingPut<T>[] = [];
	private isClosed = false;

	/**
	 * Create work queue
	 *
	 * @param capacity - maximum number of stored items (positive integer or Infinity)
	 * @throws RangeError when capacity is invalid
	 */
	constructor(readonly capacity: number) {
		if (capacity !== Number.POSITIVE_INFINITY && !(Number.isInteger(capacity) && capacity > 0)) {
			throw new RangeError(`invalid queue capacity: ${ capacity }`);
		}
	}

	/**
	 * Number of stored items
	 */
	get size() {
		return this.items.length;
	}

	/**
	 * Number of producers waiting for room
	 */
	get waitingPuts() {
		return this.putters.length;
	}

	/**
	 * True once closed
	 */
	get closed() {
		return this.isClosed;
	}

	/**
	 * Add an item, waiting while the queue is full
	 *
	 * @param item - item to add
	 * @throws QueueClosedError when the queue is closed before the item is accepted
	 */
	async put(item: T): Promise<void> {
		if (this.isClosed) {
			throw new QueueClosedError();
		}
		const taker = this.takers.shift();
		if (taker) {
			taker(item);
			return;
		}
		if (this.items.length < this.capacity) {
			this.items.push(item);
			return;
		}
		await new Promise<void>((resolve, reject) => {
			this.putters.push({ item, resolve, reject });
		});
	}

	/**
	 * Remove the next item, waiting while the queue is empty
	 *
	 * @returns the next item, or undefined once the queue is closed and empty
	 */
	async take(): Promise<T | undefined> {
		const item = this.items.shift();
		if (item !== undefined) {
			const putter = this.putters.shift();
			if (putter) {
				this.items.push(putter.item);
				putter.resolve();
			}
			return item;
		}
		if (this.isClosed) {
			return undefined;
		}
		return new Promise(resolve => {
			this.takers.push(resolve);
		});
	}

	/**
	 * Close the queue: waiting takers get undefined, waiting producers are rejected
	 *
	 * Stored items can still be taken or discarded.
	 */
	close() {
		if (this.isClosed) {
			return;
		}
		this.isClosed = true;
		for (const taker of this.takers.splice(0)) {
			taker(undefined);
		}
		for (const putter of this.putters.splice(0)) {
			putter.reject(new QueueClosedError());
		}
	}

	/**
	 * Remove and return every stored item
	 *
	 * @returns the removed items
	 */
	discard() {
		return this.items.splice(0);
	}
}
