export interface LogContext {
    correlationId: string;
    method?: string;
    url?: string;
    [ key: string ]: unknown;
}
