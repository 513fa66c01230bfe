export * from './SpellingCorrectionStage.js';
export * from './GrammarCorrectionStage.js';
export * from './ModelCorrectionStage.js';
export * from './TtsNormalizationStage.js';
