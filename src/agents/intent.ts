/**
 * Keyword intent classifier. Deterministic stand-in for a model-backed
 * analyser: it only decides whether a message is a product search, a cart
 * action, a price comparison, a greeting, or small talk.
 */
import type { IntentAnalysis, IntentClassifier } from './types.js';

const PRODUCT_KEYWORDS = [
  'product', 'item', 'available', 'stock', 'buy', 'shop', 'find', 'search', 'show me',
  'what do you have', 'recommend', 'suggest', 'looking for',
];
const CART_KEYWORDS = ['cart', 'basket', 'add it', 'add the', 'add this', 'add that'];
const PRICE_KEYWORDS = ['compare', 'comparison', 'cheaper', 'price', 'good deal', 'worth it'];
const GREETINGS = ['hi', 'hello', 'hey', 'good morning', 'good evening'];

/** Leading phrases stripped from a message to get the search terms. */
const QUERY_PREFIXES = [
  /^(can you |could you |please )?(show me|find me|find|search for|search|i'?m looking for|looking for|i want|i need)\s+/,
  /^(some|a|an|the)\s+/,
];

function includesPhrase(text: string, phrase: string): boolean {
  return new RegExp(`\\b${phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}`).test(text);
}

export function extractSearchQuery(message: string): string {
  let query = message.trim().toLowerCase().replace(/[?!.]+$/, '');
  for (const prefix of QUERY_PREFIXES) query = query.replace(prefix, '');
  return query.trim() || message.trim();
}

export function createKeywordIntentClassifier(): IntentClassifier {
  return {
    classify(message): IntentAnalysis {
      const text = message.trim().toLowerCase();

      if (CART_KEYWORDS.some((keyword) => includesPhrase(text, keyword))) {
        return { intentType: 'cart_management', needsProductSearch: false, searchQuery: '', confidence: 0.7 };
      }
      if (PRICE_KEYWORDS.some((keyword) => includesPhrase(text, keyword))) {
        return { intentType: 'price_comparison', needsProductSearch: false, searchQuery: '', confidence: 0.7 };
      }
      if (PRODUCT_KEYWORDS.some((keyword) => includesPhrase(text, keyword))) {
        return {
          intentType: 'product_search',
          needsProductSearch: true,
          searchQuery: extractSearchQuery(message),
          confidence: 0.7,
        };
      }
      if (GREETINGS.some((greeting) => text === greeting || text.startsWith(`${greeting} `) || text.startsWith(`${greeting},`))) {
        return { intentType: 'greeting', needsProductSearch: false, searchQuery: '', confidence: 0.9 };
      }
      return { intentType: 'conversation', needsProductSearch: false, searchQuery: '', confidence: 0.5 };
    },
  };
}
