export * from './schemas';
export { coerceProfile, countFieldCoverage } from './profileSchema';
export { extractText, readDocument, cleanTitle, MAX_TEXT_LENGTH } from './textExtractor';
export { classify, scoreKeywords, CLASSIFICATION_RULES, DEFAULT_CLASSIFICATION } from './classifier';
export {
  synthesizeDescriptions,
  extractSentences,
  scoreSentence,
  FALLBACK_SHORT_DESCRIPTION,
  FALLBACK_LONG_DESCRIPTION,
} from './descriptionSynthesizer';
export { resolveLogo, findLogoInDocument, buildFaviconServiceUrl, type LogoResolverOptions } from './logoResolver';
export { extractContacts, detectTechnologies } from './contactExtractor';
export { validateProfile } from './qualityGate';
export { mergeProfiles, computeCoverageStats } from './merger';
export {
  runEnrichmentPipeline,
  processDocument,
  discoverDocuments,
  InputDirectoryError,
  MIN_TEXT_LENGTH,
  type DocumentInput,
  type PipelineOptions,
  type PipelineRunResult,
  type AcceptedDocument,
} from './pipeline';
export {
  writePipelineArtifacts,
  runMergeStep,
  readRawProfiles,
  writeFinalProfiles,
  MergeInputError,
  RAW_PROFILES_FILE,
  FINAL_PROFILES_FILE,
  FAILED_DOMAINS_FILE,
  CONTACTS_FILE,
} from './artifacts';
