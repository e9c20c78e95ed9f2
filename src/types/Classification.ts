export interface MissingDependencyFailure {
  kind: 'missing-dependency';
  moduleName: string;  // Name as it appeared in the diagnostic
  packageName: string;  // Installable name after alias mapping
  diagnostic: string;
}

export interface GenericFailure {
  kind: 'generic';
  diagnostic: string;
}

export type FailureClassification = MissingDependencyFailure | GenericFailure;

export function isMissingDependency(
  classification: FailureClassification
): classification is MissingDependencyFailure {
  return classification.kind === 'missing-dependency';
}
