import { BackendInfo, TranslationBackend } from './types';
import { translateSafely, translateSequentially } from './sequential';
import { translateWithContext } from './contextChain';

export interface BatchOptions {
  /** Pass previous translations as context when the backend supports it */
  useContext?: boolean;
  contextWindow?: number;
}

/**
 * Dispatches translation requests to registered backends by id
 */
export class TranslationEngine {
  private backends = new Map<string, TranslationBackend>();
  private defaultBackendId: string;

  /**
   * @param defaultBackendId - Used for unknown ids; falls back to the first
   *   backend when it names none of them
   */
  constructor(backends: Array<[string, TranslationBackend]>, defaultBackendId: string) {
    for (const [id, backend] of backends) {
      this.backends.set(id, backend);
    }

    const first = backends[0];
    if (!first) {
      throw new Error('TranslationEngine needs at least one backend');
    }

    if (this.backends.has(defaultBackendId)) {
      this.defaultBackendId = defaultBackendId;
    } else {
      console.warn(
        `[TranslationEngine] Unknown default backend "${defaultBackendId}", using "${first[0]}"`
      );
      this.defaultBackendId = first[0];
    }
  }

  get defaultBackend(): string {
    return this.defaultBackendId;
  }

  backendIds(): string[] {
    return [...this.backends.keys()];
  }

  /**
   * Adds a backend, replacing any backend already registered under the id
   */
  registerBackend(backendId: string, backend: TranslationBackend): void {
    this.backends.set(backendId, backend);
  }

  /**
   * Looks up a backend, falling back to the default for unknown ids
   */
  getBackend(backendId?: string): TranslationBackend {
    const id = backendId ?? this.defaultBackendId;
    const backend = this.backends.get(id);
    if (backend) {
      return backend;
    }

    if (backendId !== undefined) {
      console.warn(
        `[TranslationEngine] Unknown backend "${backendId}", using "${this.defaultBackendId}"`
      );
    }

    const fallback = this.backends.get(this.defaultBackendId);
    if (!fallback) {
      throw new Error(`Default backend "${this.defaultBackendId}" is not registered`);
    }
    return fallback;
  }

  async translate(
    text: string,
    sourceLang: string,
    targetLang: string,
    backendId?: string
  ): Promise<string> {
    return translateSafely(this.getBackend(backendId), text, sourceLang, targetLang);
  }

  /**
   * Translates a batch of texts. The result always has one entry per input,
   * in input order; an item that could not be translated keeps its source text.
   */
  async batchTranslate(
    texts: string[],
    sourceLang: string,
    targetLang: string,
    backendId?: string,
    options: BatchOptions = {}
  ): Promise<string[]> {
    const backend = this.getBackend(backendId);
    if (texts.length === 0) {
      return [];
    }

    if (options.useContext && backend.supportsContext) {
      return translateWithContext(backend, texts, sourceLang, targetLang, options.contextWindow ?? 3);
    }

    let results: string[];
    try {
      results = await backend.batchTranslate(texts, sourceLang, targetLang);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[${backend.id}] batch translation failed, retrying item by item: ${message}`);
      return translateSequentially(backend, texts, sourceLang, targetLang);
    }

    if (results.length !== texts.length) {
      console.warn(
        `[${backend.id}] returned ${results.length} translations for ${texts.length} texts`
      );
    }
    return texts.map((text, i) => results[i] ?? text);
  }

  /**
   * Ids of the backends whose availability check passes
   */
  async listAvailableBackends(): Promise<string[]> {
    const available: string[] = [];
    for (const [id, backend] of this.backends) {
      if (await this.checkAvailable(backend)) {
        available.push(id);
      }
    }
    return available;
  }

  async describeBackends(): Promise<Record<string, BackendInfo>> {
    const description: Record<string, BackendInfo> = {};
    for (const [id, backend] of this.backends) {
      description[id] = {
        available: await this.checkAvailable(backend),
        costClass: backend.costClass,
        supportsContext: backend.supportsContext,
      };
    }
    return description;
  }

  private async checkAvailable(backend: TranslationBackend): Promise<boolean> {
    try {
      return await backend.isAvailable();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[${backend.id}] availability check failed: ${message}`);
      return false;
    }
  }
}
