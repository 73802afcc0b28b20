import { SecurityMetrics, SecurityRating } from '../interfaces';
import {
  MESSAGE_DIVERSITY_THRESHOLD,
  PASSWORD_CRITERION_POINTS,
  PASSWORD_MIN_LENGTH,
  PASSWORD_STRONG_THRESHOLD,
  SECURITY_RATING_EXCELLENT,
  SECURITY_RATING_GOOD,
  SECURITY_RATING_MODERATE,
} from './constants';

/**
 * Score a password 0-100: 25 points each for length, upper case, lower case and digits
 */
export function passwordStrength(password: string): number {
  const criteria = [
    Array.from(password).length >= PASSWORD_MIN_LENGTH,
    /\p{Lu}/u.test(password),
    /\p{Ll}/u.test(password),
    /\p{Nd}/u.test(password),
  ];
  return criteria.filter(Boolean).length * PASSWORD_CRITERION_POINTS;
}

/**
 * Ratio of distinct (lower-cased) characters to message length
 */
export function messageDiversity(message: string): number {
  const characters = Array.from(message);
  if (characters.length === 0) {
    return 0;
  }
  return new Set(Array.from(message.toLowerCase())).size / characters.length;
}

function rate(score: number): SecurityRating {
  if (score >= SECURITY_RATING_EXCELLENT) {
    return 'EXCELLENT';
  }
  if (score >= SECURITY_RATING_GOOD) {
    return 'GOOD';
  }
  if (score >= SECURITY_RATING_MODERATE) {
    return 'MODERATE';
  }
  return 'WEAK';
}

/**
 * Advisory heuristics shown before hiding; never used to block an operation
 */
export function getSecurityMetrics(message: string, password: string): SecurityMetrics {
  const strength = passwordStrength(password);
  const diversity = messageDiversity(message);
  const rawScore = (strength + diversity * 100) / 2;

  const recommendations: string[] = [];
  if (strength < PASSWORD_STRONG_THRESHOLD) {
    recommendations.push('Use a stronger password with mixed case, numbers, and symbols');
  }
  if (diversity < MESSAGE_DIVERSITY_THRESHOLD) {
    recommendations.push('Consider using a more varied message with different characters');
  }
  if (recommendations.length === 0) {
    recommendations.push('Excellent security configuration');
  }

  return {
    passwordStrength: strength,
    messageDiversity: diversity,
    securityScore: Math.round(rawScore),
    securityRating: rate(rawScore),
    recommendations,
  };
}
