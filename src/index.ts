export * from './errors';
export * from './config';
export * from './data';
export * from './analysis/count-model';
export * from './analysis/size-factors';
export * from './analysis/dispersion';
export * from './analysis/glm';
export * from './analysis/multiple-testing';
export * from './analysis/transform';
export * from './analysis/pca';
export * from './analysis/pipeline';
