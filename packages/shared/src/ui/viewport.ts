/**
 * Viewport dimensions used to resolve anchored layouts.
 */
export interface UiViewport {
  width: number;
  height: number;
}

/**
 * Reads the current browser viewport size.
 */
export const readViewport = (): UiViewport => {
  if (globalThis.window === undefined) {
    return { width: 0, height: 0 };
  }

  return {
    width: window.innerWidth,
    height: window.innerHeight,
  };
};
