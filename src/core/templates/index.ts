/**
 * Template rendering exports
 */

export {
  parseTemplate,
  referencedRelations,
  referencedFields,
  substitute,
  locate,
  type ParsedTemplate,
  type TemplateSegment,
  type TextSegment,
  type PlaceholderSegment,
} from './template-engine';
export {
  renderEnvironment,
  parseEnvironment,
  isValidEnvironmentKey,
  type RenderOptions,
} from './environment-renderer';
