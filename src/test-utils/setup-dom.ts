// jsdom does not implement the Web Animations API or matchMedia; Shoelace uses both when components toggle state.
if (typeof Element !== 'undefined') {
    if (typeof Element.prototype.getAnimations !== 'function') {
        Object.defineProperty(Element.prototype, 'getAnimations', {
            configurable: true,
            writable: true,
            value: () => []
        });
    }
    if (typeof Element.prototype.animate !== 'function') {
        // Finishes immediately, as an animation with zero duration would.
        Object.defineProperty(Element.prototype, 'animate', {
            configurable: true,
            writable: true,
            value: () => {
                const animation = new EventTarget();
                setTimeout(() => animation.dispatchEvent(new Event('finish')), 0);
                return Object.assign(animation, { cancel: () => animation.dispatchEvent(new Event('cancel')), finished: Promise.resolve() });
            }
        });
    }
}

if (typeof window !== 'undefined' && typeof window.matchMedia !== 'function') {
    Object.defineProperty(window, 'matchMedia', {
        configurable: true,
        writable: true,
        value: (query: string) => Object.assign(new EventTarget(), {
            matches: false,
            media: query,
            onchange: null,
            addListener: () => undefined,
            removeListener: () => undefined
        })
    });
}
