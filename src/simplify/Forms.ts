/**
 * Labeled alternative forms of one expression
 */

import { Expression } from '../expr/AST.js';
import { serializeExpression } from '../expr/ExpressionUtils.js';

export type FormKind = 'EXPANDED' | 'FACTORED' | 'GROUPED' | 'STRUCTURAL';

export interface SimplifiedForm {
  expression: Expression;
  kind: FormKind;
  label: string;
}

export function makeForm(expression: Expression, kind: FormKind, label: string): SimplifiedForm {
  return { expression, kind, label };
}

/**
 * Forms in order, without later structural duplicates
 */
export function displayForms(forms: readonly SimplifiedForm[]): SimplifiedForm[] {
  const seen = new Set<string>();
  const result: SimplifiedForm[] = [];

  for (const form of forms) {
    const key = serializeExpression(form.expression);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(form);
  }

  return result;
}
