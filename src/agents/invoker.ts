import { ObserverInvocationError, describeError } from "../errors.js";
import type { Logger } from "../logging.js";
import type { ModelInvoker } from "../dispatch/dispatcher.js";
import type { ObserverInvocation, ObserverPayload } from "../types/observer.js";
import { parseObserverReply } from "./parse.js";
import { buildObserverPrompt, buildSystemPrompt, loadProtocol } from "./prompt.js";
import type { ProviderCallOptions } from "./provider.js";
import { callProvider } from "./provider.js";

export type ProviderCall = (options: ProviderCallOptions) => Promise<string>;

export interface ProviderModelInvokerOptions {
  rootDir: string;
  call?: ProviderCall;
  logger?: Logger;
}

/** Default invoker: one chat completion per observer, reply parsed as JSON. */
export class ProviderModelInvoker implements ModelInvoker {
  private readonly call: ProviderCall;
  private protocol: Promise<string | null> | undefined;

  constructor(private readonly options: ProviderModelInvokerOptions) {
    this.call = options.call ?? ((callOptions) => callProvider(callOptions));
  }

  async invoke(request: ObserverInvocation, signal: AbortSignal): Promise<ObserverPayload> {
    const { observer } = request;
    this.protocol ??= loadProtocol(this.options.rootDir);
    const protocol = await this.protocol;

    let reply: string;
    try {
      reply = await this.call({
        systemPrompt: buildSystemPrompt(observer),
        userPrompt: buildObserverPrompt({
          content: request.content,
          openObservations: request.openObservations,
          protocol,
        }),
        model: observer.model,
        signal,
      });
    } catch (error) {
      throw new ObserverInvocationError(observer.name, describeError(error), error);
    }

    this.options.logger?.debug("Observer replied", {
      observer: observer.name,
      length: reply.length,
    });
    return parseObserverReply(observer.name, reply);
  }
}
