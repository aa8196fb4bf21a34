export type * from "./information";
export type * from "./renderer";
export type * from "./resources";
