import axios from 'axios';
import scrapeIt from 'scrape-it';
import {NetworkError, describeError} from '../lib/errors';
import logger from '../lib/logger';
import type {Submission} from './types';

const log = logger.child({scope: 'retriever'});

export const MIN_REQUEST_INTERVAL = 1500;

export interface Clock {
	now(): number,
	sleep(ms: number): Promise<void>,
}

export const systemClock: Clock = {
	now: () => Date.now(),
	sleep: (ms) => new Promise((resolve) => {
		setTimeout(resolve, ms);
	}),
};

/**
 * Keeps at least `interval` ms between the end of one request and the start of the next.
 * Each pipeline run owns its own limiter.
 */
export class RateLimiter {
	private lastRequestAt: number | null = null;

	constructor(
		readonly interval = MIN_REQUEST_INTERVAL,
		private readonly clock: Clock = systemClock,
	) {}

	async wait() {
		if (this.lastRequestAt === null) {
			return;
		}
		const elapsed = this.clock.now() - this.lastRequestAt;
		if (elapsed < this.interval) {
			await this.clock.sleep(this.interval - elapsed);
		}
	}

	mark() {
		this.lastRequestAt = this.clock.now();
	}

	async schedule<T>(request: () => Promise<T>): Promise<T> {
		await this.wait();
		try {
			return await request();
		} finally {
			this.mark();
		}
	}
}

export interface SourceExtractor {
	extract(html: string): string | null,
}

export class SubmissionCodeExtractor implements SourceExtractor {
	constructor(readonly selector = '#submission-code') {}

	extract(html: string) {
		const {code} = scrapeIt.scrapeHTML<{code: string}>(html, {
			code: {
				selector: this.selector,
				trim: false,
			},
		});
		return code === '' ? null : code;
	}
}

export const getSubmissionUrl = ({contest_id, id}: Pick<Submission, 'contest_id' | 'id'>) => (
	`https://atcoder.jp/contests/${encodeURIComponent(contest_id)}/submissions/${id}`
);

export class SourceRetriever {
	constructor(
		private readonly limiter: RateLimiter = new RateLimiter(),
		private readonly extractor: SourceExtractor = new SubmissionCodeExtractor(),
	) {}

	async retrieve(submission: Submission): Promise<string | null> {
		const url = getSubmissionUrl(submission);
		log.debug(`Fetching ${url}`);

		const html = await this.limiter.schedule(async () => {
			try {
				// Error pages have no #submission-code and end up skipped
				const {data, status} = await axios.get<string>(url, {
					responseType: 'text',
					validateStatus: () => true,
				});
				if (status < 200 || status >= 300) {
					log.warn(`${url} responded with status ${status}`);
				}
				return data;
			} catch (error) {
				throw new NetworkError(`Failed to fetch ${url}: ${describeError(error)}`, url, error);
			}
		});

		return this.extractor.extract(html);
	}
}
