/// <reference types="vite/client" />

declare const __APP_TITLE__: string;

interface ImportMetaEnv {
  readonly VITE_ROUND_SECONDS?: string;
  readonly VITE_SETTLE_DELAY_MS?: string;
  readonly VITE_APP_TITLE?: string;
}
