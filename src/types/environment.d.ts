declare global {
    namespace NodeJS {
      interface ProcessEnv {
        LOG_LEVEL?: string;
        LOG_FILE?: string;
        DEMO_SEED?: string;
        DEMO_RANGE?: string;
        PUSH_RANGE?: string;
      }
    }
  }
  
  export {};
