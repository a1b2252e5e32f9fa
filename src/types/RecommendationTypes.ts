export interface UploadedImage {
  buffer: Buffer;
  mimeType: string;
  originalName?: string;
}

export interface Medication {
  name: string;
  dosage: string;
  purpose: string;
}

export interface RecommendationBundle {
  medications: Medication[];
  treatments: string[];
  precautions: string[];
  follow_up: string[];
}

export interface AnalysisResponse {
  analysis: string;
  recommendations: RecommendationBundle;
}

/**
 * Outcome of a best-effort upstream call. A failed call still carries the
 * empty fallback in `data`, so callers can use it without branching.
 */
export type ServiceResponse<T> =
  | { success: true; data: T }
  | { success: false; data: T; error: string };
