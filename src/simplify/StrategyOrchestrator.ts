/**
 * Strategy orchestration
 *
 * Runs the simplification strategies independently over the same input,
 * keeps the structurally distinct results in strategy order and pads the
 * list to at least three forms when possible.
 */

import { Expression } from '../expr/AST.js';
import { fixedPoint, isBinary, serializeExpression } from '../expr/ExpressionUtils.js';
import { formatExpression } from '../expr/Formatter.js';
import { EngineOptions, ResolvedOptions, resolveOptions } from './Options.js';
import { FormKind, SimplifiedForm, makeForm } from './Forms.js';
import { NamedStep, runSteps } from './Guard.js';
import { canonicalize } from './Canonicalizer.js';
import { simplify as simplifyTrig } from './TrigRewriter.js';
import { foldConstants, removeOneFactors, removeZeroTerms, simplifyPowers } from './Cleanup.js';
import { generateAllForms } from './FormGenerator.js';
import { cancelCommonFactors } from './FractionSimplifier.js';

const MINIMUM_FORMS = 3;
const TAG = 'orchestrator';

interface EngineSteps {
  canonicalize: NamedStep;
  fold: NamedStep;
  dropZero: NamedStep;
  dropOne: NamedStep;
  powers: NamedStep;
  trig: NamedStep;
  cancel: NamedStep;
}

function engineSteps(options: ResolvedOptions): EngineSteps {
  return {
    canonicalize: { name: 'canonicalize', apply: expr => canonicalize(expr, options) },
    fold: { name: 'fold constants', apply: foldConstants },
    dropZero: { name: 'remove zero terms', apply: removeZeroTerms },
    dropOne: { name: 'remove one factors', apply: removeOneFactors },
    powers: { name: 'simplify powers', apply: simplifyPowers },
    trig: { name: 'trig identities', apply: expr => simplifyTrig(expr, options) },
    cancel: { name: 'cancel common factors', apply: expr => cancelCommonFactors(expr, options) }
  };
}

type Strategy = (input: Expression, options: ResolvedOptions) => Expression;

function iterate(input: Expression, steps: readonly NamedStep[], options: ResolvedOptions): Expression {
  return fixedPoint(input, expr => runSteps(TAG, steps, expr, options.verbose), options.maxIterations);
}

function findForm(forms: readonly SimplifiedForm[], label: string): SimplifiedForm | undefined {
  return forms.find(form => form.label === label);
}

const expandStrategy: Strategy = (input, options) => {
  const s = engineSteps(options);
  return iterate(input, [s.canonicalize, s.fold, s.dropZero, s.dropOne, s.powers], options);
};

const trigStrategy: Strategy = (input, options) => {
  const s = engineSteps(options);
  return iterate(input, [s.canonicalize, s.fold, s.dropZero, s.dropOne, s.trig, s.powers], options);
};

const factorStrategy: Strategy = (input, options) => {
  const s = engineSteps(options);
  const prepared = runSteps(TAG, [s.canonicalize, s.trig], input, options.verbose);
  const forms = generateAllForms(prepared, options);
  const label = isBinary(prepared, '/') ? 'numerator factored' : 'factored';
  return (findForm(forms, label) ?? forms[0]).expression;
};

const fractionStrategy: Strategy = (input, options) => {
  const s = engineSteps(options);
  const prepared = runSteps(TAG, [s.canonicalize, s.trig], input, options.verbose);
  const forms = generateAllForms(prepared, options);
  if (isBinary(prepared, '/')) {
    const cancelled = findForm(forms, 'exp cancelled');
    if (cancelled) return cancelled.expression;
  }
  return forms[forms.length - 1].expression;
};

const fullStrategy: Strategy = (input, options) => iterativeSimplify(input, options);

const cancelStrategy: Strategy = (input, options) => {
  const s = engineSteps(options);
  return runSteps(TAG, [s.canonicalize, s.trig, s.cancel], input, options.verbose);
};

const STRATEGIES: ReadonlyArray<{ strategy: Strategy; kind: FormKind; label: string }> = [
  { strategy: expandStrategy, kind: 'EXPANDED', label: 'expanded form' },
  { strategy: trigStrategy, kind: 'STRUCTURAL', label: 'trigonometric simplification' },
  { strategy: factorStrategy, kind: 'FACTORED', label: 'factored form' },
  { strategy: fractionStrategy, kind: 'FACTORED', label: 'reduced fraction' },
  { strategy: fullStrategy, kind: 'FACTORED', label: 'fully simplified' },
  { strategy: cancelStrategy, kind: 'FACTORED', label: 'common factors cancelled' }
];

class FormCollector {
  readonly forms: SimplifiedForm[] = [];
  private seen = new Set<string>();

  constructor(private verbose: boolean, initial: readonly SimplifiedForm[] = []) {
    for (const form of initial) {
      const key = serializeExpression(form.expression);
      if (this.seen.has(key)) continue;
      this.seen.add(key);
      this.forms.push(form);
    }
  }

  add(expression: Expression, kind: FormKind, label: string): void {
    const key = serializeExpression(expression);
    if (this.seen.has(key)) {
      if (this.verbose) {
        console.log(`[${TAG}] skipping duplicate ${label}: ${formatExpression(expression)}`);
      }
      return;
    }

    this.seen.add(key);
    this.forms.push(makeForm(expression, kind, label));
    if (this.verbose) {
      console.log(`[${TAG}] added ${label}: ${formatExpression(expression)}`);
    }
  }
}

/**
 * Top up a short list of forms with an "intermediate step"
 * (canonicalize, fold, trig) and then an "alternative form"
 * (canonicalize, drop zero, drop one), skipping duplicates
 */
export function padForms(
  forms: readonly SimplifiedForm[],
  input: Expression,
  options: EngineOptions = {}
): SimplifiedForm[] {
  const resolved = resolveOptions(options);
  const collector = new FormCollector(resolved.verbose, forms);
  if (collector.forms.length >= MINIMUM_FORMS) return collector.forms;

  const s = engineSteps(resolved);
  const intermediate = runSteps(TAG, [s.canonicalize, s.fold, s.trig], input, resolved.verbose);
  collector.add(intermediate, 'STRUCTURAL', 'intermediate step');

  if (collector.forms.length < MINIMUM_FORMS) {
    const alternative = runSteps(TAG, [s.canonicalize, s.dropZero, s.dropOne], input, resolved.verbose);
    collector.add(alternative, 'STRUCTURAL', 'alternative form');
  }
  return collector.forms;
}

/**
 * All structurally distinct forms produced by the strategies
 */
export function generateMultipleForms(expr: Expression, options: EngineOptions = {}): SimplifiedForm[] {
  const resolved = resolveOptions(options);

  try {
    if (resolved.verbose) {
      console.log(`[${TAG}] input: ${formatExpression(expr)}`);
    }

    const collector = new FormCollector(resolved.verbose);
    for (const { strategy, kind, label } of STRATEGIES) {
      collector.add(strategy(expr, resolved), kind, label);
    }
    const forms = padForms(collector.forms, expr, resolved);

    if (resolved.verbose) {
      console.log(`[${TAG}] ${forms.length} distinct forms`);
    }
    return forms;
  } catch (error) {
    if (resolved.verbose) {
      const message = error instanceof Error ? error.message : String(error);
      console.log(`[${TAG}] form generation failed: ${message}`);
    }
    return [makeForm(expr, 'STRUCTURAL', 'original form')];
  }
}

/**
 * Repeat one guarded round of every rewrite until nothing changes
 */
export function iterativeSimplify(expr: Expression, options: EngineOptions = {}): Expression {
  const resolved = resolveOptions(options);
  const s = engineSteps(resolved);
  return iterate(expr, [s.canonicalize, s.fold, s.dropZero, s.dropOne, s.trig, s.powers], resolved);
}
