export const INCLUSION_VERIFIER = Symbol("INCLUSION_VERIFIER");
