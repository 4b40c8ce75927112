/**
 * Mock: Greeter Plugin
 *
 * Fetches a greeting at startup through its init effect.
 */

import { Effect } from "../core/effect.js";
import { ManifestBuilder, BasePlugin } from "../sdk/plugin-sdk.js";
import type { Init, PluginManifest, Update } from "../plugins/api.js";

export type GreeterMessage = { readonly type: "greeted"; readonly text: string };

export interface GreeterState {
  greeting: string | undefined;
  received: number;
}

export type GreeterOutput = { readonly type: "ready"; readonly greeting: string };

export type GreetingSource = () => Promise<string>;

export class GreeterPlugin extends BasePlugin<GreeterMessage, GreeterState, GreeterOutput> {
  readonly manifest: PluginManifest = ManifestBuilder.create("greeter").version("0.1.0").build();

  constructor(private readonly source: GreetingSource = async () => "hello") {
    super();
  }

  init(): Init<GreeterState, GreeterMessage> {
    return {
      state: { greeting: undefined, received: 0 },
      effect: Effect.perform(
        () => this.source(),
        (text): GreeterMessage => ({ type: "greeted", text }),
      ),
    };
  }

  update(state: GreeterState, message: GreeterMessage): Update<GreeterMessage, GreeterOutput> {
    state.greeting = message.text;
    state.received += 1;
    return this.emit({ type: "ready", greeting: message.text });
  }
}

export const createGreeterPlugin = (source?: GreetingSource) => new GreeterPlugin(source);
