// review-core: transcript parsing, cleaning, verdict parsing and routing.
// No HTTP and no file access; collaborators come in through the ports
// declared in pipeline.ts, prompt.ts and notification.ts.

export const REVIEW_CORE_VERSION = '0.1.0';

export * from './errors';
export * from './segmenter';
export * from './header';
export * from './entries';
export * from './cleaner';
export * from './trimmer';
export * from './transcript';
export * from './completeness';
export * from './prompt';
export * from './verdict';
export * from './routing';
export * from './notification';
export * from './pipeline';
