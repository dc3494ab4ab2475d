// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMAS INDEX — API Request Validation Schemas
// ═══════════════════════════════════════════════════════════════════════════════

export {
  AddEventSchema,
  AddChatSchema,
  AddVisionSchema,
  AddAppActivitySchema,
  ContextQuerySchema,
  CountQuerySchema,
  ArchiveDateParamSchema,
  type AddEventInput,
  type AddChatInput,
  type AddVisionInput,
  type AddAppActivityInput,
} from './events.js';
