import { fileExtension } from '../filters/deterministic.js';
import type { LanguageAnalyzer } from './types.js';
import { cAnalyzer, goAnalyzer, javaLikeAnalyzer, rustAnalyzer, typescriptAnalyzer } from './brace.js';
import { pythonAnalyzer, rubyAnalyzer } from './indentation.js';

/**
 * Analyzers keyed by file extension. A later registration for the same
 * extension replaces the earlier one.
 */
export class AnalyzerRegistry {
  private readonly byExtension = new Map<string, LanguageAnalyzer>();

  register(analyzer: LanguageAnalyzer): this {
    for (const ext of analyzer.extensions) {
      this.byExtension.set(ext.toLowerCase(), analyzer);
    }
    return this;
  }

  forPath(filePath: string): LanguageAnalyzer | null {
    const ext = fileExtension(filePath);
    if (!ext) return null;
    return this.byExtension.get(ext) ?? null;
  }

  extensions(): string[] {
    return Array.from(this.byExtension.keys()).sort();
  }
}

export function createDefaultRegistry(): AnalyzerRegistry {
  return new AnalyzerRegistry()
    .register(typescriptAnalyzer)
    .register(javaLikeAnalyzer)
    .register(goAnalyzer)
    .register(rustAnalyzer)
    .register(cAnalyzer)
    .register(pythonAnalyzer)
    .register(rubyAnalyzer);
}
