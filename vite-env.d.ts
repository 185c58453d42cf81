/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_API_BASE?: string;
  readonly VITE_PUSH_URL?: string;
  readonly VITE_ENERGY_DEBUG?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
