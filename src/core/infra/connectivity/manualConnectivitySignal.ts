import type { ConnectivityListener, ConnectivitySignal } from '../../app/ports/connectivitySignal';

/** Signal fired by the host application when it observes the network coming back. */
export class ManualConnectivitySignal implements ConnectivitySignal {
  private readonly listeners = new Set<ConnectivityListener>();

  subscribe(listener: ConnectivityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  notifyOnline(): void {
    for (const listener of [...this.listeners]) {
      listener();
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
