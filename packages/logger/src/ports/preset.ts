export const loggerPresets = ["FULL", "THREAD", "SIMPLE"] as const

/**
 * Layout of a rendered line.
 *
 * - `FULL`: timestamp, level, thread, source location, message
 * - `THREAD`: level, thread, source location, message
 * - `SIMPLE`: level, message
 */
export type LoggerPreset = (typeof loggerPresets)[number]

export const colorModes = ["auto", "always", "never"] as const

export type ColorMode = (typeof colorModes)[number]
