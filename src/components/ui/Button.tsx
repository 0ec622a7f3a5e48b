import type { ButtonHTMLAttributes } from "react";
import styles from "./ui.module.css";

// =============================================================================
// Types
// =============================================================================

/**
 * Visual variants supported by the UI stylesheet.
 * Keep this in sync with `ui.module.css`.
 */
type Variant = "default" | "ghost";

/**
 * Button sizing supported by the UI stylesheet.
 * Keep this in sync with `ui.module.css`.
 */
type Size = "sm" | "md";

/**
 * Base props for the standard <button> component.
 * We omit the native `size` attribute because we use our own `Size` union instead.
 *
 * `pressed` renders a toggle button (`aria-pressed`) with the active style.
 */
type ButtonProps = Omit<ButtonHTMLAttributes<HTMLButtonElement>, "size"> & {
  variant?: Variant;
  size?: Size;
  pressed?: boolean;
};

// =============================================================================
// Styling helpers
// =============================================================================

/**
 * Minimal className combiner:
 * - ignores falsy values
 * - joins with spaces
 */
function cx(...parts: Array<string | false | undefined>) {
  return parts.filter(Boolean).join(" ");
}

function buttonClass(variant: Variant, size: Size, pressed: boolean, className?: string) {
  return cx(
    styles.button,
    variant === "ghost" && styles.buttonGhost,
    size === "sm" && styles.buttonSm,
    pressed && styles.buttonPressed,
    className
  );
}

// =============================================================================
// Components
// =============================================================================

/**
 * Standard button component for in-app actions.
 *
 * Notes:
 * - Defaults `type="button"` to avoid accidental form submissions.
 * - Passes through all other native button props (onClick, disabled, aria-*, etc.).
 * - `aria-pressed` is only emitted when `pressed` is given, so plain buttons
 *   are not announced as toggles.
 */
export function Button({
  variant = "default",
  size = "md",
  pressed,
  className,
  type = "button",
  ...props
}: ButtonProps) {
  return (
    <button
      type={type}
      className={buttonClass(variant, size, pressed === true, className)}
      aria-pressed={pressed}
      {...props}
    />
  );
}
