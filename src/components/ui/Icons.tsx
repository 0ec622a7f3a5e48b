import type { SVGProps } from "react";
import type { ComponentType, ReactNode } from "react";

// =============================================================================
// Shared types / base icon component
// =============================================================================

type IconProps = SVGProps<SVGSVGElement>;

/**
 * Base SVG wrapper used by every icon in this module.
 *
 * Keeps icons visually consistent (size, stroke, viewBox) and accessible:
 * - `aria-hidden="true"` because these icons are decorative by default.
 * - Consumers should add text labels elsewhere (e.g., button label / aria-label).
 */
function SvgIcon({ children, ...props }: IconProps & { children: ReactNode }) {
  return (
    <svg
      width={18}
      height={18}
      viewBox="0 0 24 24"
      fill="none"
      stroke="currentColor"
      strokeWidth={2}
      strokeLinecap="round"
      strokeLinejoin="round"
      aria-hidden="true"
      focusable="false"
      {...props}
    >
      {children}
    </svg>
  );
}

// =============================================================================
// Navigation / page icons
// =============================================================================

/** Pen over a page (editor route). */
export function IconEditor(props: IconProps) {
  return (
    <SvgIcon {...props}>
      <path d="M12 20h9" />
      <path d="M16.5 3.5a2.12 2.12 0 0 1 3 3L7 19l-4 1 1-4z" />
    </SvgIcon>
  );
}

/** Sliders icon (settings route). */
export function IconSettings(props: IconProps) {
  return (
    <SvgIcon {...props}>
      <path d="M4 21v-7" />
      <path d="M4 10V3" />
      <path d="M12 21v-9" />
      <path d="M12 8V3" />
      <path d="M20 21v-5" />
      <path d="M20 12V3" />
      <path d="M1 14h6" />
      <path d="M9 8h6" />
      <path d="M17 16h6" />
    </SvgIcon>
  );
}

// =============================================================================
// Toolbar / formatting icons
// =============================================================================

/** Horizontal ellipsis (overflow trigger). */
export function IconMore(props: IconProps) {
  return (
    <SvgIcon {...props}>
      <circle cx="5" cy="12" r="1" />
      <circle cx="12" cy="12" r="1" />
      <circle cx="19" cy="12" r="1" />
    </SvgIcon>
  );
}

export function IconBold(props: IconProps) {
  return (
    <SvgIcon {...props}>
      <path d="M6 4h8a4 4 0 0 1 0 8H6z" />
      <path d="M6 12h9a4 4 0 0 1 0 8H6z" />
    </SvgIcon>
  );
}

export function IconItalic(props: IconProps) {
  return (
    <SvgIcon {...props}>
      <path d="M19 4h-9" />
      <path d="M14 20H5" />
      <path d="M15 4 9 20" />
    </SvgIcon>
  );
}

export function IconUnderline(props: IconProps) {
  return (
    <SvgIcon {...props}>
      <path d="M6 3v7a6 6 0 0 0 12 0V3" />
      <path d="M4 21h16" />
    </SvgIcon>
  );
}

export function IconStrikethrough(props: IconProps) {
  return (
    <SvgIcon {...props}>
      <path d="M16 4H9a3 3 0 0 0-2.83 4" />
      <path d="M14 12a4 4 0 0 1 0 8H6" />
      <path d="M4 12h16" />
    </SvgIcon>
  );
}

export function IconUndo(props: IconProps) {
  return (
    <SvgIcon {...props}>
      <path d="M3 7v6h6" />
      <path d="M21 17a9 9 0 0 0-15-6.7L3 13" />
    </SvgIcon>
  );
}

export function IconRedo(props: IconProps) {
  return (
    <SvgIcon {...props}>
      <path d="M21 7v6h-6" />
      <path d="M3 17a9 9 0 0 1 15-6.7L21 13" />
    </SvgIcon>
  );
}

// =============================================================================
// Symbolic lookup
// =============================================================================

/**
 * Icons reachable by symbolic reference (`ToolbarAction.icon`).
 * Add an entry here to make a new reference usable by toolbar actions.
 */
const iconsByName: Record<string, ComponentType<IconProps>> = {
  bold: IconBold,
  italic: IconItalic,
  underline: IconUnderline,
  strikethrough: IconStrikethrough,
  undo: IconUndo,
  redo: IconRedo,
  more: IconMore,
  editor: IconEditor,
  settings: IconSettings,
};

export function hasIcon(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(iconsByName, name);
}

/**
 * Render the icon registered under `name`.
 * Unknown references render nothing so the label alone carries the action.
 */
export function ToolbarIcon({ name, ...props }: IconProps & { name: string }) {
  if (!hasIcon(name)) return null;

  const Icon = iconsByName[name];
  return <Icon {...props} />;
}
