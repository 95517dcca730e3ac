import type { Margins, PageProfile, PaperSize } from '../types.js';

export const MM_PER_INCH = 25.4;
export const POINTS_PER_INCH = 72;

/**
 * Convert millimetres to PDF points
 */
export function mmToPt(mm: number): number {
  return (mm * POINTS_PER_INCH) / MM_PER_INCH;
}

/**
 * Convert PDF points to millimetres
 */
export function ptToMm(pt: number): number {
  return (pt * MM_PER_INCH) / POINTS_PER_INCH;
}

/**
 * ISO A4 (210 × 297 mm), the default for reports
 */
export const a4Profile: PageProfile = {
  name: 'a4',
  paper: { width: 210, height: 297 },
  margins: { top: 20, right: 20, bottom: 20, left: 20 },
  fontSize: 11,
  lineHeight: 1.35,
};

/**
 * US Letter (8.5 × 11 in)
 */
export const letterProfile: PageProfile = {
  name: 'letter',
  paper: { width: 215.9, height: 279.4 },
  margins: { top: 25.4, right: 25.4, bottom: 25.4, left: 25.4 },
  fontSize: 11,
  lineHeight: 1.35,
};

/**
 * ISO A5 (148 × 210 mm) for handouts
 */
export const a5Profile: PageProfile = {
  name: 'a5',
  paper: { width: 148, height: 210 },
  margins: { top: 15, right: 15, bottom: 15, left: 15 },
  fontSize: 10,
  lineHeight: 1.3,
};

/**
 * Registry of available page profiles
 */
export const profiles: Record<string, PageProfile> = {
  a4: a4Profile,
  letter: letterProfile,
  a5: a5Profile,
};

/**
 * Default profile used when none is specified
 */
export const defaultProfile: PageProfile = a4Profile;

/**
 * Get a profile by name, or return the default if none is given
 */
export function getPageProfile(name?: string): PageProfile {
  if (!name) {
    return defaultProfile;
  }
  const profile = profiles[name.toLowerCase()];
  if (!profile) {
    throw new Error(`Unknown page profile: ${name}. Available: ${Object.keys(profiles).join(', ')}`);
  }
  return profile;
}

/**
 * Get the content area (paper minus margins) in millimetres
 */
export function getContentArea(paper: PaperSize, margins: Margins) {
  return {
    width: paper.width - margins.left - margins.right,
    height: paper.height - margins.top - margins.bottom,
    left: margins.left,
    top: margins.top,
  };
}
