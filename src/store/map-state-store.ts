// Role: holds the editor state and notifies subscribed UI components.
// State changes are tagged with their source ('UI', 'MAP', ...) so a
// component can ignore the echo of its own dispatch.

import { createInitialState, type IAppState, type StateSource } from './IState';

type Listener = (state: IAppState, source: StateSource) => void;

export class MapStateStore {
    private state: IAppState = createInitialState();
    private listeners: Listener[] = [];

    public getState(): Readonly<IAppState> {
        return Object.freeze({ ...this.state });
    }

    public dispatch(newState: Partial<IAppState>, source: StateSource): void {
        const previousState = this.state;
        this.state = {
            ...previousState,
            ...newState
        };

        // Notify subscribers
        this.listeners.forEach(listener => listener(this.getState(), source));
    }

    public subscribe(listener: Listener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }
}
