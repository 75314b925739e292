/**
 * The part of an HTTP response needed to notice a client going away.
 */
export interface DisconnectSource {
  readonly writableEnded: boolean;
  once(event: 'close', listener: () => void): unknown;
  off(event: 'close', listener: () => void): unknown;
}

export interface DisconnectGuard {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * Abort when the response closes before a reply was written.
 */
export function abortOnDisconnect(res: DisconnectSource): DisconnectGuard {
  const controller = new AbortController();
  const onClose = () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  };
  res.once('close', onClose);

  return {
    signal: controller.signal,
    dispose: () => {
      res.off('close', onClose);
    },
  };
}
