import { ReferenceTables } from '../../types/domain.types';

/**
 * Source of the static reference tables (ports, countries, hazards).
 */
export interface IReferenceDataAdapter {
  /**
   * Loads and validates the tables. Throws DataIntegrityError when the source fails validation.
   */
  load(): Promise<ReferenceTables>;
}
