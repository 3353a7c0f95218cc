export { OutlinePipeline, type OutlineAnalysis } from './pipeline.js';
export { DEFAULT_TUNING, resolveTuning } from './tuning.js';
export { reconstructLines, buildLine } from './line-reconstructor.js';
export { detectTitle, type TitleResult } from './title-detector.js';
export { FontLevelMap, buildFontLevelMap, clusterSizes, type FontLevelEntry, type SizeCluster } from './font-hierarchy.js';
export { filterFurniture, type FurnitureDecision, type FurnitureReason, type FurnitureResult } from './furniture-filter.js';
export { HEADING_RULES, type HeadingFilter, type HeadingRule, type HeadingRuleName } from './heading-rules.js';
export { classifyLines, classifyLine, type ClassifiedLine, type ClassifierContext } from './line-classifier.js';
export { refineHierarchy, collapseDuplicates } from './hierarchy-refiner.js';
