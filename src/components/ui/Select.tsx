import { useId } from "react";
import type { SelectHTMLAttributes } from "react";
import styles from "./ui.module.css";

export type SelectOption = { value: string; label: string };

type Props = Omit<SelectHTMLAttributes<HTMLSelectElement>, "size" | "children"> & {
  /** Visible label rendered above the select (optional). */
  label?: string;
  /** Helper text rendered below the select (optional). */
  hint?: string;
  /** Options in display order. */
  options: readonly SelectOption[];
};

// =============================================================================
// Component
// =============================================================================

/**
 * Form select with optional label and hint text.
 *
 * Accessibility:
 * - When `label` is provided, the <label htmlFor> targets the <select id>.
 *   If `id` is not provided, a stable auto-generated id is used.
 * - When `hint` is provided, it is referenced via `aria-describedby`.
 */
export function Select({ label, hint, options, id, className, ...props }: Props) {
  const autoId = useId();

  // Only label-bearing selects need an id.
  const selectId = id ?? (label ? autoId : undefined);
  const hintId = hint ? `${selectId ?? autoId}-hint` : undefined;

  return (
    <div className={styles.field}>
      {label && (
        <label className={styles.fieldLabel} htmlFor={selectId}>
          {label}
        </label>
      )}

      <select
        id={selectId}
        className={className ? `${styles.select} ${className}` : styles.select}
        aria-describedby={hintId}
        {...props}
      >
        {options.map((o) => (
          <option key={o.value} value={o.value}>
            {o.label}
          </option>
        ))}
      </select>

      {hint && (
        <div id={hintId} className={styles.fieldHint}>
          {hint}
        </div>
      )}
    </div>
  );
}
