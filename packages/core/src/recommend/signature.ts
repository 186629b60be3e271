import type { ProjectSignature } from '../types.js';
import type { CapabilityClassifier } from './classifier.js';
import { defaultClassifier } from './classifier.js';

/** Pure: the same request always yields the same signature. */
export function inferSignature(
  request: string,
  classifier: CapabilityClassifier = defaultClassifier,
): ProjectSignature {
  return {
    inferredTechStack: classifier.extractTags(request),
    projectType: classifier.inferProjectType(request),
    complexity: classifier.estimateComplexity(request),
  };
}
