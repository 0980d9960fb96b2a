/**
 * Inferencer module types
 */

export interface InferencerOptions {
  /** Caller-forced categorical flag; wins over auto-detection */
  categorical?: boolean;
}
