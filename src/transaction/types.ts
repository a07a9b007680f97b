/** A component whose state can be captured and put back. */
export interface Snapshottable<S> {
	snapshot(): S;
	restore(state: S): void;
}
