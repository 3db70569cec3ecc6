import {orderBy, uniqBy} from 'lodash';
import {ACCEPTED, getArchiveKey} from './types';
import type {Submission} from './types';

/**
 * Picks the submissions to archive in this run, most recent first.
 * Only the latest accepted submission of each problem not yet in the archive survives;
 * older ones for the same problem are dropped for good.
 */
export const selectSubmissions = (submissions: Submission[], archivedKeys: ReadonlySet<string>): Submission[] => {
	const candidates = submissions
		.filter((submission) => submission.result === ACCEPTED)
		.filter((submission) => !archivedKeys.has(getArchiveKey(submission)));

	return uniqBy(orderBy(candidates, ['epoch_second'], ['desc']), getArchiveKey);
};
