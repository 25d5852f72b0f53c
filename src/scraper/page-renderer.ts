export interface RenderOptions {
  userAgent?: string;
  /** Waited for after navigation; absence is reported, not thrown */
  waitForSelector?: string;
  navigationTimeoutMs: number;
  selectorTimeoutMs: number;
  /** Global variable holding the page's serialized app state */
  stateVariable?: string;
}

export interface RenderedPage {
  html: string;
  /** Null when navigation produced no main-frame response */
  httpStatusCode: number | null;
  finalUrl: string;
  title: string;
  /** Decoded value of the state variable, or null when the page has none */
  pageState: unknown;
  signals: {
    networkIdle: boolean;
    selectorFound: boolean;
  };
}

/**
 * Narrow browser capability the browser-rendered strategy depends on
 */
export interface PageRenderer {
  render(url: string, options: RenderOptions, signal?: AbortSignal): Promise<RenderedPage>;
  close(): Promise<void>;
}
