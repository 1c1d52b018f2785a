import { createClaudeClient } from './claude-client.js';
import { formattingClassifier, vendorClassifier } from './classifiers.js';
import { createClaudeDocSuggester, missingDocSuggester } from './doc-suggestions.js';
import { HookRegistry } from './registry.js';

export function createDefaultHooks(anthropicApiKey?: string): HookRegistry {
  const hooks = new HookRegistry()
    .register(formattingClassifier)
    .register(vendorClassifier)
    .register(missingDocSuggester);

  const claude = createClaudeClient(anthropicApiKey);
  if (claude) {
    hooks.register(createClaudeDocSuggester(claude));
  }
  return hooks;
}
