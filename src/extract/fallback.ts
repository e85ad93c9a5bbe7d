import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { normalizeWhitespace } from '../utils/text.js';

export type Matcher<I, O> = (input: I) => O | undefined;

/** Runs matchers in declared order and returns the first defined result. */
export function firstMatch<I, O>(input: I, matchers: ReadonlyArray<Matcher<I, O>>): O | undefined {
  for (const matcher of matchers) {
    const result = matcher(input);
    if (result !== undefined) {
      return result;
    }
  }
  return undefined;
}

export type Scope = Cheerio<Element>;

/** First element under the scope matching `selector`, if its text is non-empty. */
export function selectorTextMatcher(selector: string): Matcher<Scope, string> {
  return (scope) => {
    const element = scope.find(selector).first();
    if (element.length === 0) {
      return undefined;
    }
    const text = normalizeWhitespace(element.text());
    return text || undefined;
  };
}

export function selectorElementMatcher(selector: string): Matcher<Scope, Cheerio<Element>> {
  return (scope) => {
    const element = scope.find(selector).first();
    return element.length > 0 ? element : undefined;
  };
}

export function textFromSelectors(scope: Scope, selectors: readonly string[]): string | undefined {
  return firstMatch(
    scope,
    selectors.map((selector) => selectorTextMatcher(selector)),
  );
}
