export type * from './issue.type';
export type * from './plan.type';
export type * from './points.type';
export type * from './validate.type';
export type * from './report.type';
