export type ConnectivityListener = () => void;

export interface ConnectivitySignal {
  /** Returns a function that removes the listener. */
  subscribe(listener: ConnectivityListener): () => void;
}
