import axios from 'axios';
import {DecodeError, NetworkError, describeError} from '../lib/errors';
import logger from '../lib/logger';
import {submissionsSchema} from './types';
import type {Submission} from './types';

const log = logger.child({scope: 'fetcher'});

export const SUBMISSIONS_API_URL = 'https://kenkoooo.com/atcoder/atcoder-api/results';

export const getSubmissionsUrl = (userId: string) => (
	`${SUBMISSIONS_API_URL}?user=${encodeURIComponent(userId)}`
);

export const fetchSubmissions = async (userId: string): Promise<Submission[]> => {
	const url = getSubmissionsUrl(userId);
	log.info(`Fetching submissions of ${userId}...`);

	let data: unknown;
	try {
		// A non-2xx body fails validation below
		({data} = await axios.get<unknown>(url, {validateStatus: () => true}));
	} catch (error) {
		throw new NetworkError(`Failed to fetch ${url}: ${describeError(error)}`, url, error);
	}

	const result = submissionsSchema.safeParse(data);
	if (!result.success) {
		throw new DecodeError(`Unexpected response from ${url}: ${result.error.message}`, url, result.error);
	}

	log.info(`Fetched ${result.data.length} submissions`);
	return result.data;
};
