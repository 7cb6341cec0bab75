/**
 * One-call entry point: text or AST in, canonical form, labeled
 * alternatives and the form chosen for differentiation out
 */

import { Expression } from '../expr/AST.js';
import { parseExpression } from '../expr/Parser.js';
import { EngineOptions, resolveOptions } from './Options.js';
import { SimplifiedForm, displayForms } from './Forms.js';
import { canonicalize } from './Canonicalizer.js';
import { generateMultipleForms } from './StrategyOrchestrator.js';
import { selectBestForm } from './FormSelector.js';

export interface AnalysisResult {
  input: Expression;
  canonical: Expression;
  forms: SimplifiedForm[];
  best: SimplifiedForm;
}

export function analyze(input: string | Expression, options: EngineOptions = {}): AnalysisResult {
  const resolved = resolveOptions(options);
  const expr = typeof input === 'string' ? parseExpression(input) : input;

  const canonical = canonicalize(expr, resolved);
  const forms = displayForms(generateMultipleForms(expr, resolved));
  const best = selectBestForm(forms);

  return { input: expr, canonical, forms, best };
}
