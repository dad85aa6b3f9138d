export type VerificationSourceName = 'local' | 'crossref' | 'openalex';

export type VerificationStatus = 'verified' | 'unverified';

/** Bibliographic fields as a source reports them */
export interface RetrievedReferenceData {
  title: string;
  authors: string[];
  year: number | null;
  venue: string | null;
  doi: string | null;
  url: string | null;
}

export interface VerificationSource {
  name: VerificationSourceName;
  found: boolean;
  matchScore: number; // 0-1
  retrievedData: RetrievedReferenceData | null;
  errors: string[];
}

export interface UrlCheck {
  url: string;
  available: boolean;
  status: number | null;
  error?: string;
}

export interface VerificationResult {
  recordId: string;
  status: VerificationStatus;
  bestMatch: VerificationSource | null;
  sources: VerificationSource[];
  urls: UrlCheck[];
}
