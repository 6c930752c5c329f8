/** Source of the current time; injected so expiry can be evaluated against any instant. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** Anything positioned inside a dense 1-based ordering. */
export interface OrderedItem {
  id: string;
  order: number;
}
