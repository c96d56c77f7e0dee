/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_BRIDGE_HOST?: string;
  readonly VITE_BRIDGE_SECURE?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
