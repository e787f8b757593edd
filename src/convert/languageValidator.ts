import languageData from "./data/languages.json";

export interface LanguageValidator {
  validate(text: string, validLanguages: readonly string[]): boolean;
}

interface ScriptRule {
  code: string;
  pattern: RegExp;
  /** Scripts counted toward this one once its own characters reach `minOwnShare` of the letters. */
  absorbs: string[];
  minOwnShare: number;
}

export interface StopwordLanguageValidatorOptions {
  sampleLength?: number;
  /** Share of letters a script must cover to decide the language on its own. */
  minScriptShare?: number;
  minStopwordHits?: number;
}

// Heuristic detection: a dominant non-Latin script wins outright, otherwise
// the language with the most stopword hits in the sample.
export class StopwordLanguageValidator implements LanguageValidator {
  private readonly sampleLength: number;
  private readonly minScriptShare: number;
  private readonly minStopwordHits: number;
  private readonly scripts: ScriptRule[];
  private readonly stopwords: Map<string, Set<string>>;

  constructor(options: StopwordLanguageValidatorOptions = {}) {
    this.sampleLength = options.sampleLength ?? 5000;
    this.minScriptShare = options.minScriptShare ?? 0.3;
    this.minStopwordHits = options.minStopwordHits ?? 3;
    this.scripts = languageData.scripts.map((rule) => ({
      code: rule.code,
      pattern: new RegExp(rule.pattern, "g"),
      absorbs: rule.absorbs ?? [],
      minOwnShare: rule.minOwnShare ?? 0,
    }));
    this.stopwords = new Map(
      Object.entries(languageData.stopwords).map(([code, words]): [string, Set<string>] => [code, new Set(words)]),
    );
  }

  validate(text: string, validLanguages: readonly string[]): boolean {
    if (validLanguages.length === 0) {
      return true;
    }
    const language = this.detect(text);
    return language !== undefined && validLanguages.includes(language);
  }

  detect(text: string): string | undefined {
    const sample = text.slice(0, this.sampleLength).toLowerCase();
    const letters = sample.match(/\p{L}/gu)?.length ?? 0;
    if (letters === 0) {
      return undefined;
    }

    const ownCounts = new Map(
      this.scripts.map((rule): [string, number] => [rule.code, sample.match(rule.pattern)?.length ?? 0]),
    );
    let bestScript: ScriptRule | undefined;
    let bestScriptCount = 0;
    for (const rule of this.scripts) {
      const own = ownCounts.get(rule.code) ?? 0;
      // Japanese prose is mostly Han characters; a share of kana claims them.
      const absorbed =
        own > 0 && own / letters >= rule.minOwnShare
          ? rule.absorbs.reduce((acc, code) => acc + (ownCounts.get(code) ?? 0), 0)
          : 0;
      const count = own + absorbed;
      if (count > bestScriptCount) {
        bestScript = rule;
        bestScriptCount = count;
      }
    }
    if (bestScript && bestScriptCount / letters >= this.minScriptShare) {
      return bestScript.code;
    }

    const words = sample.match(/\p{L}+/gu) ?? [];
    let bestLanguage: string | undefined;
    let bestHits = 0;
    for (const [code, stopwords] of this.stopwords) {
      const hits = words.filter((word) => stopwords.has(word)).length;
      if (hits > bestHits) {
        bestLanguage = code;
        bestHits = hits;
      }
    }
    return bestHits >= this.minStopwordHits ? bestLanguage : undefined;
  }
}
