import type { Logger } from './logger';
import { silentLogger } from './logger';
import { WorkQueue } from './work-queue';

/**
 * Default number of workers
 */
export const DEFAULT_WORKERS = 4;

/**
 * Queue capacity per worker when not configured
 */
export const QUEUE_CAPACITY_PER_WORKER = 4;

/**
 * Worker pool options
 *
 * @template Job - job type
 */
export interface WorkerPoolOptions<Job> {
	/**
	 * Maximum number of queued jobs (Infinity for an unbounded queue)
	 */
	queueCapacity: number;
	/**
	 * Logger used to report job failures
	 */
	logger?: Logger;
	/**
	 * Function called for each pending job discarded at shutdown
	 */
	onDiscard?: (job: Job) => void;
}

/**
 * Pool statistics
 */
export interface WorkerPoolStats {
	/**
	 * Number of running workers
	 */
	workers: number;
	/**
	 * Number of jobs being processed
	 */
	active: number;
	/**
	 * Number of queued jobs
	 */
	queued: number;
}

/**
 * Fixed set of workers processing jobs from a bounded queue
 *
 * @template Job - job type
 */
export class WorkerPool<Job extends object> {
	private readonly queue: WorkQueue<Job>;
	private readonly logger: Logger;
	private readonly onDiscard: ((job: Job) => void) | undefined;
	private workers: Promise<void>[] = [];
	private running = 0;
	private activeJobs = 0;
	private started = false;

	/**
	 * Create worker pool
	 *
	 * @param handler - function processing one job
	 * @param opts - pool options
	 */
	constructor(
		private readonly handler: (job: Job, workerId: number) => Promise<void>,
		opts: WorkerPoolOptions<Job>,
	) {
		this.queue = new WorkQueue(opts.queueCapacity);
		this.logger = opts.logger ?? silentLogger;
		this.onDiscard = opts.onDiscard;
	}

	/**
	 * Pool statistics
	 */
	get stats(): WorkerPoolStats {
		return {
			workers: this.running,
			active: this.activeJobs,
			queued: this.queue.size,
		};
	}

	/**
	 * Launch the workers
	 *
	 * @param count - number of workers
	 * @throws when count is not a positive integer or the pool was already started
	 */
	start(count: number = DEFAULT_WORKERS) {
		if (!Number.isInteger(count) || count < 1) {
			throw new RangeError(`invalid worker count: ${ count }`);
		}
		if (this.started) {
			throw new Error('worker pool already started');
		}
		this.started = true;
		for (let id = 0; id < count; id++) {
			this.running++;
			this.workers.push(this.runWorker(id));
		}
	}

	/**
	 * Submit a job, waiting while the queue is full
	 *
	 * @param job - job to process
	 * @throws QueueClosedError when the pool is shut down
	 */
	async submit(job: Job) {
		await this.queue.put(job);
	}

	/**
	 * Stop the pool and wait for every worker to exit
	 *
	 * @param opts - shutdown options
	 * @param opts.discardPending - discard queued jobs instead of processing them
	 */
	async shutdown({ discardPending = false } = {}) {
		this.queue.close();
		if (discardPending) {
			for (const job of this.queue.discard()) {
				this.onDiscard?.(job);
			}
		}
		const { workers } = this;
		this.workers = [];
		await Promise.all(workers);
	}

	private async runWorker(id: number) {
		this.logger.debug(`worker ${ id } started`);
		try {
			for (;;) {
				// eslint-disable-next-line no-await-in-loop
				const job = await this.queue.take();
				if (job === undefined) {
					return;
				}
				this.activeJobs++;
				try {
					// eslint-disable-next-line no-await-in-loop
					await this.handler(job, id);
				} catch (err: unknown) {
					this.logger.error(`worker ${ id }: job failed`, err);
				} finally {
					this.activeJobs--;
				}
			}
		} finally {
			this.running--;
			this.logger.debug(`worker ${ id } stopped`);
		}
	}
}
