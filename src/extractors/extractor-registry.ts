/**
 * Registry mapping file extensions to language extractors.
 *
 * One registry belongs to one BlockExtractor, so concurrent analysis runs
 * never share parser caches.
 */
import type { LanguageExtractor, SupportedLanguage } from './interface.types.js';

export type { LanguageExtractor } from './interface.types.js';

/**
 * Factory function for creating extractors.
 * Used for lazy instantiation.
 */
export type ExtractorFactory = () => LanguageExtractor;

interface ExtractorRegistration {
  factory: ExtractorFactory;
  languages: SupportedLanguage[];
  extensions: string[];
  instance?: LanguageExtractor;
}

/**
 * Normalize an extension to the registry's key form: lower-case, dot-prefixed.
 */
export function normalizeExtension(extension: string): string {
  const lower = extension.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

export class ExtractorRegistry {
  private registrations = new Map<string, ExtractorRegistration>();
  private extensionMap = new Map<string, string>();

  /**
   * Register a language extractor.
   *
   * @param id Unique identifier for the extractor (e.g., 'typescript', 'grammar')
   * @param factory Factory function to create the extractor
   * @param languages Languages this extractor supports
   * @param extensions File extensions this extractor handles
   */
  register(
    id: string,
    factory: ExtractorFactory,
    languages: SupportedLanguage[],
    extensions: string[]
  ): void {
    const previous = this.registrations.get(id);
    if (previous?.instance) {
      previous.instance.dispose();
    }

    this.registrations.set(id, { factory, languages, extensions });

    for (const ext of extensions) {
      this.extensionMap.set(normalizeExtension(ext), id);
    }
  }

  /**
   * Get the extractor id registered for an extension, or null.
   */
  resolveId(extension: string): string | null {
    return this.extensionMap.get(normalizeExtension(extension)) ?? null;
  }

  /**
   * Get an extractor by ID.
   * Creates the instance lazily if not already created.
   */
  getById(id: string): LanguageExtractor | null {
    const registration = this.registrations.get(id);

    if (!registration) {
      return null;
    }

    if (!registration.instance) {
      registration.instance = registration.factory();
    }

    return registration.instance;
  }

  isSupported(extension: string): boolean {
    return this.extensionMap.has(normalizeExtension(extension));
  }

  getSupportedExtensions(): string[] {
    return Array.from(this.extensionMap.keys());
  }

  /**
   * Get every language with a registered extractor, in registration order.
   */
  getSupportedLanguages(): SupportedLanguage[] {
    const languages = new Set<SupportedLanguage>();
    for (const registration of this.registrations.values()) {
      for (const language of registration.languages) {
        languages.add(language);
      }
    }
    return Array.from(languages);
  }

  /**
   * Dispose all extractor instances.
   */
  disposeAll(): void {
    for (const registration of this.registrations.values()) {
      if (registration.instance) {
        registration.instance.dispose();
        registration.instance = undefined;
      }
    }
  }
}
