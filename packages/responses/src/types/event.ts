import type { FunctionCallOutputItem, OutputItem, OutputText, ResponseObject } from './response.js';

type TextLocation = {
  readonly item_id: string;
  readonly output_index: number;
  readonly content_index: number;
};

/**
 * Events in the order the emulated stream emits them. Every event carries a
 * `sequence_number` that starts at 0 and increases by one per event.
 */
export type ResponseStreamEventBody =
  | { readonly type: 'response.created'; readonly response: ResponseObject }
  | { readonly type: 'response.in_progress'; readonly response: ResponseObject }
  | { readonly type: 'response.output_item.added'; readonly output_index: number; readonly item: OutputItem }
  | ({ readonly type: 'response.content_part.added'; readonly part: OutputText } & TextLocation)
  | ({ readonly type: 'response.output_text.delta'; readonly delta: string } & TextLocation)
  | ({ readonly type: 'response.output_text.done'; readonly text: string } & TextLocation)
  | ({ readonly type: 'response.content_part.done'; readonly part: OutputText } & TextLocation)
  | {
      readonly type: 'response.function_call_arguments.done';
      readonly item_id: FunctionCallOutputItem['id'];
      readonly output_index: number;
      readonly arguments: string;
    }
  | { readonly type: 'response.output_item.done'; readonly output_index: number; readonly item: OutputItem }
  | { readonly type: 'response.completed'; readonly response: ResponseObject };

export type ResponseStreamEvent = ResponseStreamEventBody & { readonly sequence_number: number };

export type ResponseStreamEventType = ResponseStreamEvent['type'];
