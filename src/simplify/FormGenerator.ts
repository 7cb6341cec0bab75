/**
 * Factored and fraction-reduced alternatives of a canonical expression
 */

import { Expression } from '../expr/AST.js';
import {
  EPSILON,
  approxEqual,
  buildProduct,
  buildSum,
  expressionsEqual,
  fixedPoint,
  flattenProduct,
  flattenSum,
  isBinary,
  isCallTo,
  isNumber,
  isSum,
  makeBinaryOp,
  makeCall,
  makeNumber,
  serializeExpression
} from '../expr/ExpressionUtils.js';
import { EngineOptions, resolveOptions } from './Options.js';
import { SimplifiedForm, makeForm } from './Forms.js';
import { NamedStep, tryApply } from './Guard.js';
import {
  FunctionFactor,
  Term,
  divideTerm,
  isConstantTerm,
  makeTerm,
  termFromExpression,
  termToExpression
} from './Term.js';

const MIN_COMMON_COEFFICIENT = 1e-6;

/**
 * Euclid's algorithm on absolute values, to within EPSILON
 */
export function gcdNumbers(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y >= EPSILON) {
    [x, y] = [y, x % y];
  }
  return x;
}

/**
 * Greatest common Term: coefficient GCD, and the minimum exponent of every
 * variable and function present in all terms (kept only when positive)
 */
export function findGCD(terms: readonly Term[]): Term {
  if (terms.length === 0) {
    return makeTerm(1);
  }

  const [first, ...rest] = terms;
  const common = rest.reduce((acc, term) => gcdNumbers(acc, term.coefficient), Math.abs(first.coefficient));
  // Incommensurable coefficients leave a vanishing remainder, not a real divisor
  const coefficient = common < MIN_COMMON_COEFFICIENT ? 1 : common;

  const variables: [string, number][] = [];
  for (const [name, exponent] of first.variables) {
    let min = exponent;
    let shared = true;
    for (const term of rest) {
      const other = term.variables.get(name);
      if (other === undefined) {
        shared = false;
        break;
      }
      min = Math.min(min, other);
    }
    if (shared && min > EPSILON) {
      variables.push([name, min]);
    }
  }

  const functions: [string, FunctionFactor][] = [];
  for (const [key, factor] of first.functions) {
    let min = factor.exponent;
    let shared = true;
    for (const term of rest) {
      const other = term.functions.get(key);
      if (other === undefined) {
        shared = false;
        break;
      }
      min = Math.min(min, other.exponent);
    }
    if (shared && min > EPSILON) {
      functions.push([key, { call: factor.call, exponent: min }]);
    }
  }

  return makeTerm(coefficient, variables, functions);
}

function isTrivialGCD(gcd: Term): boolean {
  return isConstantTerm(gcd) && approxEqual(gcd.coefficient, 1);
}

function dividesEvery(gcd: Term, terms: readonly Term[]): boolean {
  return terms.every(term => {
    for (const [name, exponent] of gcd.variables) {
      if ((term.variables.get(name) ?? 0) < exponent - EPSILON) return false;
    }
    for (const [key, factor] of gcd.functions) {
      if ((term.functions.get(key)?.exponent ?? 0) < factor.exponent - EPSILON) return false;
    }
    return true;
  });
}

/**
 * Pull the greatest common factor out of a sum: GCD × Σ(addend / GCD).
 * Non-sums and sums whose GCD is trivial come back unchanged.
 */
export function extractCommonFactor(expr: Expression): Expression {
  if (!isSum(expr)) {
    return expr;
  }

  const addends = flattenSum(expr);
  if (addends.length < 2) {
    return expr;
  }

  // Decomposition merges repeated factors inside an addend (f·f^2 → f^3)
  const terms = addends.map(termFromExpression);

  let gcd = findGCD(terms);
  if (isTrivialGCD(gcd)) {
    return expr;
  }

  if (!dividesEvery(gcd, terms)) {
    gcd = makeTerm(gcd.coefficient);
  }

  const quotients = terms.map(term => termToExpression(divideTerm(term, gcd)));
  const sum = buildSum(quotients);

  if (isTrivialGCD(gcd)) {
    return sum;
  }

  return makeBinaryOp('*', termToExpression(gcd), sum);
}

interface ExpFactor {
  argument: Expression;
  exponent: number;
}

interface SplitFactors {
  others: Expression[];
  exps: Map<string, ExpFactor>;
}

function expFactorOf(factor: Expression): ExpFactor | null {
  if (isCallTo(factor, 'exp')) {
    return { argument: factor.argument, exponent: 1 };
  }
  if (isBinary(factor, '^') && isCallTo(factor.left, 'exp') && isNumber(factor.right)) {
    return { argument: factor.left.argument, exponent: factor.right.value };
  }
  return null;
}

function splitExpFactors(side: Expression): SplitFactors {
  const others: Expression[] = [];
  const exps = new Map<string, ExpFactor>();

  for (const factor of flattenProduct(side)) {
    const exp = expFactorOf(factor);
    if (exp === null) {
      others.push(factor);
      continue;
    }

    const key = serializeExpression(exp.argument);
    const existing = exps.get(key);
    exps.set(key, {
      argument: exp.argument,
      exponent: (existing?.exponent ?? 0) + exp.exponent
    });
  }

  return { others, exps };
}

function renderExp(factor: ExpFactor): Expression {
  const call = makeCall('exp', factor.argument);
  return approxEqual(factor.exponent, 1) ? call : makeBinaryOp('^', call, makeNumber(factor.exponent));
}

function rebuildSide(side: SplitFactors): Expression {
  return buildProduct([...side.others, ...[...side.exps.values()].map(renderExp)]);
}

function cancelExpOnce(expr: Expression): Expression {
  if (!isBinary(expr, '/')) {
    return expr;
  }

  const numerator = splitExpFactors(expr.left);
  const denominator = splitExpFactors(expr.right);
  let cancelled = false;

  for (const [key, top] of [...numerator.exps]) {
    const bottom = denominator.exps.get(key);
    if (bottom === undefined) continue;

    cancelled = true;
    const surplus = top.exponent - bottom.exponent;
    numerator.exps.delete(key);
    denominator.exps.delete(key);

    if (Math.abs(surplus) < EPSILON) continue;
    if (surplus > 0) {
      numerator.exps.set(key, { argument: top.argument, exponent: surplus });
    } else {
      denominator.exps.set(key, { argument: bottom.argument, exponent: -surplus });
    }
  }

  if (!cancelled) {
    return expr;
  }

  return makeBinaryOp('/', rebuildSide(numerator), rebuildSide(denominator));
}

/**
 * Cancel exp(u)^n factors shared by numerator and denominator,
 * keeping any surplus on the larger side
 */
export function simplifyExpInFraction(expr: Expression, options: EngineOptions = {}): Expression {
  if (!isBinary(expr, '/')) {
    return expr;
  }

  const { maxCancellationRounds } = resolveOptions(options);
  return fixedPoint(expr, cancelExpOnce, maxCancellationRounds);
}

/**
 * The input as "standard form" followed by every distinct factored form
 */
export function generateAllForms(expr: Expression, options: EngineOptions = {}): SimplifiedForm[] {
  const { verbose } = resolveOptions(options);
  const forms: SimplifiedForm[] = [makeForm(expr, 'EXPANDED', 'standard form')];

  if (isBinary(expr, '/')) {
    const factorNumerator: NamedStep = {
      name: 'factor numerator',
      apply: fraction => isBinary(fraction, '/')
        ? makeBinaryOp('/', extractCommonFactor(fraction.left), fraction.right)
        : fraction
    };
    const cancelExp: NamedStep = {
      name: 'cancel exp',
      apply: fraction => simplifyExpInFraction(fraction, options)
    };

    const factored = tryApply('forms', factorNumerator, expr, verbose);
    const cancelled = tryApply('forms', cancelExp, factored, verbose);

    if (!expressionsEqual(factored, expr)) {
      forms.push(makeForm(factored, 'FACTORED', 'numerator factored'));
    }
    if (!expressionsEqual(cancelled, expr) && !expressionsEqual(cancelled, factored)) {
      forms.push(makeForm(cancelled, 'FACTORED', 'exp cancelled'));
    }
  } else {
    const factored = tryApply('forms', { name: 'factor', apply: extractCommonFactor }, expr, verbose);
    if (!expressionsEqual(factored, expr)) {
      forms.push(makeForm(factored, 'FACTORED', 'factored'));
    }
  }

  return forms;
}
