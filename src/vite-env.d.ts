/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_TOOLBAR_BREAKPOINT?: string;
  readonly VITE_DEFAULT_LOCALE?: string;
}
