/**
 * Collection plugin: JSON qualifier dispatch.
 *
 * @module collection/plugin
 */

import { VERSION } from '../../version.js';
import {
  decodeRequest,
  errorMessage,
  errorResponse,
  type PluginInfo,
  type TextPlugin,
} from '../protocol.js';
import { applyQualifier, QUALIFIERS, type RandomSource } from './qualifiers.js';
import { fromJson, toJson } from './value.js';

export interface CollectionPluginOptions {
  random?: RandomSource;
}

export function createCollectionPlugin(options: CollectionPluginOptions = {}): TextPlugin {
  const random = options.random ?? Math.random;

  return {
    info(): PluginInfo {
      return {
        name: 'plugin-collection',
        version: VERSION,
        actions: [],
        qualifiers: QUALIFIERS.map(({ name, inputTypes, description }) => ({ name, inputTypes: [...inputTypes], description })),
      };
    },

    execute(): string {
      return errorResponse('No actions defined');
    },

    qualifier(name: string, inputJson: string): string {
      const decoded = decodeRequest(inputJson);
      if (!decoded.ok) return errorResponse(decoded.error);

      const { value, type } = decoded.request;
      try {
        const outcome = applyQualifier(name, fromJson(value), {
          type: typeof type === 'string' ? type : 'Unknown',
          random,
        });
        return outcome.ok ? JSON.stringify({ result: toJson(outcome.value) }) : errorResponse(outcome.error);
      } catch (error) {
        return errorResponse(errorMessage(error));
      }
    },
  };
}

export const collectionPlugin = createCollectionPlugin();
