declare global {
  namespace NodeJS {
    interface ProcessEnv {
      DATABASE_URL?: string;
      LOG_LEVEL?: string;
      LOG_PRETTY?: string;
    }
  }
}

export {};
