declare module "router" {
  import { IncomingMessage, ServerResponse } from "http";

  namespace Router {
    interface Request extends IncomingMessage {
      params?: Record<string, string>;
    }

    type Next = (err?: unknown) => void;

    type Handler = (
      req: Request,
      res: ServerResponse,
      next: Next
    ) => unknown;

    interface Router {
      (req: IncomingMessage, res: ServerResponse, done: Next): void;
      get(path: string, ...handlers: Handler[]): this;
      post(path: string, ...handlers: Handler[]): this;
      use(...handlers: Array<Handler | Router>): this;
    }
  }

  function Router(): Router.Router;

  export = Router;
}
