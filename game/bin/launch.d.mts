export type TsImportOptions = {
  parentURL: string;
  tsconfig: string;
};

export declare function tsImportOptions(): TsImportOptions;

export declare function launch(): Promise<unknown>;
