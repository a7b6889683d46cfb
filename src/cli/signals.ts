/**
 * Return a signal that aborts when the process receives one of signals or
 * when parent aborts. With no signals, parent itself is returned.
 *
 * The process listeners are removed after the first delivery.
 */
export function cancelOnSignal(
  parent: AbortSignal,
  ...signals: NodeJS.Signals[]
): AbortSignal {
  if (signals.length === 0) return parent

  const controller = new AbortController()

  const cleanup = (): void => {
    for (const signal of signals) {
      process.off(signal, onSignal)
    }
    parent.removeEventListener('abort', onParentAbort)
  }

  function onSignal(signal: NodeJS.Signals): void {
    cleanup()
    controller.abort(new Error(`received ${signal}`))
  }

  function onParentAbort(): void {
    cleanup()
    controller.abort(parent.reason)
  }

  if (parent.aborted) {
    controller.abort(parent.reason)
    return controller.signal
  }

  for (const signal of signals) {
    process.on(signal, onSignal)
  }
  parent.addEventListener('abort', onParentAbort, { once: true })

  return controller.signal
}
