/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_DYNAMIC_COLOR?: string;
  readonly VITE_PREVIEW_MODE?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
