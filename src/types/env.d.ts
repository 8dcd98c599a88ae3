declare global {
    namespace NodeJS {
        interface ProcessEnv {
            PORT: string,
            PROBE_URL: string,
            PROBE_WORKERS: string,
            PROBE_TIMEOUT_MS: string,
            LOG_SILENT?: string,
        }
    }
}

export {};
