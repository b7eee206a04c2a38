import { AssessmentContext } from '../types/assessment.types';
import { AssessorResult } from '../types/result.types';

export interface IRiskAssessor {
  /** Never rejects; every failure comes back as the failure variant. */
  assess(context: AssessmentContext, signal?: AbortSignal): Promise<AssessorResult>;
  healthCheck(): Promise<string>;
}
