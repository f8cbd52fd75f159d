import { TutorError } from '../../utils/errors';
import { SourceReference } from '../../utils/types';

export type QueryOutcome =
    | {
          status: 'completed';
          queryId: string;
          answer: string;
          fallback: boolean;
          grounded: boolean;
          sources: SourceReference[];
      }
    | { status: 'failed'; queryId: string; error: TutorError }
    | { status: 'cancelled'; queryId: string };
