export {
  logLevelSchema,
  parseSliceBounds,
  parseViewSettings,
  sliceBoundsSchema,
  viewSettingsSchema,
  type SliceBounds,
  type ViewSettings,
  type ViewSettingsInput,
} from './options.js';
