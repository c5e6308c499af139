/**
 * Type system - Main exports
 */

export type {
  SymbolId,
  UnresolvedId,
  KeywordKind,
  KeywordTy,
  KeywordTyOf,
  StringLiteralTy,
  NumericLiteralTy,
  BigIntLiteralTy,
  UniqueSymbolTy,
  BooleanLiteralTy,
  UnionTy,
  PropertyTy,
  ParamTy,
  RecordTy,
  FunctionTy,
  ConstructorTy,
  InterfaceTy,
  IntersectionTy,
  NamespaceTy,
  GenericTy,
  IntrinsicName,
  IntrinsicTy,
  InstanceTy,
  UnresolvedTy,
  LiteralTy,
  ComplexTy,
  Ty,
  TyKind,
  TyByKind,
  PropertyKeyType,
} from './types.js';

export type {
  ScopeKind,
  Scope,
  DeclarationKind,
  BindingAnnotation,
  AnalysisError,
  AnalysisResult,
} from './analysis.js';
