/** The already-authenticated actor an operation is attempted for. */
export interface Principal {
  id: string;
  /** Staff may manage share links on resources they do not own. */
  isAdmin?: boolean;
}
