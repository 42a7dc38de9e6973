/**
 * Records passed between the extract, transform and load stages.
 */

export interface RawObservation {
  /** Observation time reported by the API (or the run clock when it reports none). */
  readonly observedAt: Date;
  readonly city: string;
  readonly tempKelvin: number;
  /** Relative humidity, percent. */
  readonly humidity: number;
  readonly description: string;
}

export type DataQuality = 'Good' | 'Suspicious';

export interface ProcessedObservation extends RawObservation {
  readonly tempCelsius: number;
  readonly dataQuality: DataQuality;
}

