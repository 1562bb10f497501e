export type Sleeper = (ms: number) => Promise<void>

export const sleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms))
