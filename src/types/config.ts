export type IHistorySource =
  | {
      type: "sheet";
      spreadsheetId: string;
      sheetName: string;
    }
  | {
      type: "file";
      path: string;
      sheetName?: string;
    };

export interface IAppConfig {
  meta: {
    appName: string;
    description: string;
  };
  source: IHistorySource;
  cache: {
    ttlSeconds: number;
    dir: string;
  };
  history: {
    retentionYears: number;
  };
  aggregation: {
    minProportion: number;
  };
  allocation: {
    maxItems: number;
  };
  output: {
    dir: string;
    logDir: string;
  };
}
