export type {
  MatchMode,
  RuleSet,
  RuleKind,
  MutationResult,
  PatternValidation,
} from './rules.js';

export { MATCH_MODES } from './rules.js';

export type {
  HushConfig,
  MatchConfig,
  PermissionConfig,
  ConfigReader,
} from './config.js';

export type {
  SendText,
  MessageContext,
  CommandContext,
  CommandResult,
  CommandDefinition,
  InterceptResult,
  InterceptorDefinition,
  PluginHost,
} from './host.js';
