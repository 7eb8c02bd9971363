import type { AppConfig } from "../../config/types";
import type { LLMClientBundle } from "../../llm/types";
import type { VectorIndex } from "../../vectorIndex/types";

export type IndexLoader = (indexPath: string) => Promise<VectorIndex>;

export interface ServerContext {
    config: AppConfig;
    llm: LLMClientBundle;
    index?: VectorIndex;
    loadIndex: IndexLoader;
    ingestionBusy: boolean;
}

export interface RouterContext {
    readonly config: AppConfig;
    readonly llm: LLMClientBundle;
    readonly ingestionBusy: boolean;
    setIngestionBusy: (busy: boolean) => void;
    /** The index currently served, loading it from `indexPath` on first use. */
    getIndex: () => Promise<VectorIndex>;
    /** The loaded index, without triggering a load. */
    peekIndex: () => VectorIndex | undefined;
    replaceIndex: (index: VectorIndex) => void;
}

export function createRouterContext(context: ServerContext): RouterContext {
    return {
        config: context.config,
        llm: context.llm,
        get ingestionBusy() {
            return context.ingestionBusy;
        },
        setIngestionBusy: (busy: boolean) => {
            context.ingestionBusy = busy;
        },
        getIndex: async () => {
            if (!context.index) {
                context.index = await context.loadIndex(context.config.ingestion.indexPath);
            }
            return context.index;
        },
        peekIndex: () => context.index,
        replaceIndex: (index: VectorIndex) => {
            context.index = index;
        },
    };
}
