/**
 * Hash comparison of an original message and a round-tripped candidate
 */
export interface IntegrityRecord {
  match: boolean;
  score: 0 | 100;
  originalHash: string;
  candidateHash: string;
  status: 'VERIFIED' | 'CORRUPTED';
}

export type SecurityRating = 'EXCELLENT' | 'GOOD' | 'MODERATE' | 'WEAK';

/**
 * Advisory password and message heuristics
 */
export interface SecurityMetrics {
  /** 0-100 in steps of 25 */
  passwordStrength: number;
  /** Distinct characters over message length, 0-1 */
  messageDiversity: number;
  /** 0-100 */
  securityScore: number;
  securityRating: SecurityRating;
  recommendations: string[];
}
