export * from './types';
export * from './engine/Partition';
export * from './engine/Parameter';
export * from './engine/ParameterSet';
export * from './engine/Rules';
export * from './engine/RulePropagator';
export * from './engine/Combination';
export * from './engine/CombinationTable';
export * from './engine/GenerationAlgorithm';
export * from './engine/PairCoverage';
export * from './engine/PairwiseAlgorithm';
export * from './engine/LegacyPairwiseAlgorithm';
export * from './engine/CombinatorialAlgorithm';
export * from './engine/TestGenerator';
export * from './engine/InputBuilder';
export * from './engine/Random';
export * from './defaults';
export * from './errors';
