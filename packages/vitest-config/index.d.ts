export interface SharedConfig {
  test: {
    include: string[];
    environment: "node";
    clearMocks: boolean;
    restoreMocks: boolean;
  };
}

export declare const sharedConfig: SharedConfig;
