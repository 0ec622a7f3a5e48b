import { useEffect, useState } from "react";

// =============================================================================
// Viewport hooks
// =============================================================================

/**
 * React hook returning the current `window.innerWidth`, refreshed on every
 * `resize` event. Each notification is forwarded as-is; the toolbar core
 * decides whether it changes anything.
 */
export function useViewportWidth(): number {
  const [width, setWidth] = useState(() => window.innerWidth);

  useEffect(() => {
    const onResize = () => setWidth(window.innerWidth);

    window.addEventListener("resize", onResize);
    return () => window.removeEventListener("resize", onResize);
  }, []);

  return width;
}
