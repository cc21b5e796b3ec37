/// <reference types="vite/client" />

interface ImportMetaEnv {
    readonly VITE_VIEWER_LOG_LEVEL?: string;
    readonly VITE_VIEWER_INDEX_OVERFLOW?: string;
}

interface ImportMeta {
    readonly env: ImportMetaEnv;
}
