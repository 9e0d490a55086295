import type { CallSite, CallSiteProvider, LogEntryPoint } from "../../ports/call-site"
import { currentThreadName, firstLocatedFrame, unknownLocation } from "../../core/call-site"

/**
 * Reads the caller's location from a V8 stack trace captured at the logging call.
 */
export class StackCallSiteProvider implements CallSiteProvider {
  capture(boundary: LogEntryPoint): CallSite {
    const holder: { stack?: string } = {}
    Error.captureStackTrace(holder, boundary)

    const location = firstLocatedFrame(holder.stack ?? "") ?? unknownLocation()

    return { ...location, thread: currentThreadName() }
  }
}
