declare namespace NodeJS {
  interface ProcessEnv {
    DEV_LOG?: string
    SIM_ITERATIONS?: string
    SIM_HOP_LIMIT?: string
    SIM_INSTABILITY_FACTOR?: string
    SIM_DISCARD_THRESHOLD?: string
    SIM_CONCURRENCY?: string
    BASELINE_MIN_CONFIDENCE?: string
    BASELINE_MAX_AGE_DAYS?: string
    GRAPH_CONFIG_PATH?: string
  }
}
