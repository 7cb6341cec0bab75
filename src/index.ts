/**
 * symbolic-forms - Equivalent forms of algebraic expressions
 *
 * Canonicalizes expressions, generates expanded, factored, fraction-reduced
 * and trigonometrically simplified alternatives, and picks the form that is
 * cheapest to differentiate.
 */

// Core API
export { analyze, type AnalysisResult } from './simplify/Analyzer.js';
export { canonicalize, fullyExpand, sortTerms } from './simplify/Canonicalizer.js';
export { generateMultipleForms, iterativeSimplify, padForms } from './simplify/StrategyOrchestrator.js';
export { generateAllForms, extractCommonFactor, simplifyExpInFraction } from './simplify/FormGenerator.js';
export { cancelCommonFactors } from './simplify/FractionSimplifier.js';
export { simplify as simplifyTrig, foldNumericCoefficients } from './simplify/TrigRewriter.js';
export {
  selectBestForDifferentiation,
  selectBestForm,
  differentiationCost,
  formStatistics,
  type FormStatistics
} from './simplify/FormSelector.js';
export { displayForms, type SimplifiedForm, type FormKind } from './simplify/Forms.js';
export { type EngineOptions, DEFAULT_OPTIONS } from './simplify/Options.js';

// Text front end
export { parseExpression } from './expr/Parser.js';
export { formatExpression } from './expr/Formatter.js';
export { ParseError, FormSelectionError, formatParseError } from './expr/Errors.js';

// AST types
export type {
  Expression,
  NumberLiteral,
  Variable,
  FunctionCall,
  BinaryOp,
  BinaryOperator
} from './expr/AST.js';
export { expressionsEqual, serializeExpression } from './expr/ExpressionUtils.js';
