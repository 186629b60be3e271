export { parseDescriptor, parseDescriptorFile, categoryFor, complexityFromText } from './loader.js';
export type { LoadResult } from './loader.js';
export { CapabilityRegistry, RegistryIndex } from './registry.js';
export type { DiscoveryResult, RegistryOptions, ScanWarning, SearchFilters } from './registry.js';
export { registryReport } from './report.js';
export type { RegistryReport } from './report.js';
