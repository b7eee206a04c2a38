import { MitigationRequest } from '../types/mitigation.types';
import { AdvisorResult } from '../types/result.types';

export interface IMitigationAdvisor {
  /** Never rejects; every failure comes back as the failure variant. */
  advise(request: MitigationRequest, signal?: AbortSignal): Promise<AdvisorResult>;
}
