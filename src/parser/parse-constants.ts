import { fraction, type Fraction } from '../core/fraction.js';

/** Measure length used when neither `len` nor a previous measure gives one. */
export const DEFAULT_MEASURE_LENGTH: Fraction = fraction(4, 4);

/** Tuplet base note used when a tuplet omits `baseNote`. */
export const DEFAULT_TUPLET_BASE: Fraction = fraction(1, 8);

/** Notated length of each `durationType` value, without dots. */
export const DURATION_TYPES: Readonly<Record<string, Fraction>> = {
  long: fraction(4, 1),
  breve: fraction(2, 1),
  whole: fraction(1, 1),
  half: fraction(1, 2),
  quarter: fraction(1, 4),
  eighth: fraction(1, 8),
  '16th': fraction(1, 16),
  '32nd': fraction(1, 32),
  '64th': fraction(1, 64),
  '128th': fraction(1, 128),
  '256th': fraction(1, 256)
};

/** Most augmentation dots a chord or rest may carry. */
export const MAX_DOTS = 4;

/** Score-level elements that carry nothing the reader keeps. */
export const IGNORED_SCORE_ELEMENTS: ReadonlySet<string> = new Set([
  'programVersion',
  'programRevision',
  'metaTag',
  'Style',
  'Part',
  'showInvisible',
  'showUnprintable'
]);
