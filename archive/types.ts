import path from 'path';
import {z} from 'zod';

// Contest and problem ids name directories under the archive root
export const isPathSegment = (value: string) => (
	value !== '' &&
	value !== '.' &&
	value !== '..' &&
	!/[/\\]/.test(value) &&
	!path.isAbsolute(value)
);

const pathSegmentSchema = z.string().refine(isPathSegment, {message: 'Not a single path segment'});

export const submissionSchema = z.object({
	id: z.number().int(),
	epoch_second: z.number().int(),
	problem_id: pathSegmentSchema,
	contest_id: pathSegmentSchema,
	user_id: z.string(),
	language: z.string(),
	point: z.number(),
	length: z.number().int(),
	result: z.string(),
	execution_time: z.number().int().nullable(),
});

export const submissionsSchema = z.array(submissionSchema);

/** A submission record as served by the submissions API and stored in submission.json */
export type Submission = z.infer<typeof submissionSchema>;

export const ACCEPTED = 'AC';

export const ARCHIVE_HOST = 'atcoder.jp';

export const METADATA_FILE_NAME = 'submission.json';

export const getArchiveKey = ({contest_id, problem_id}: Pick<Submission, 'contest_id' | 'problem_id'>) => (
	`${contest_id}/${problem_id}`
);
