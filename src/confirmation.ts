export type ClearTrigger = 'clear' | 'cancel';

export interface ClearState {
  armed: boolean;
  dispatch: boolean; // Caller runs clearAll() only when this is true
}

// The caller owns `armed` and hands it back on the next trigger
export function nextClearState(armed: boolean, trigger: ClearTrigger): ClearState {
  if (trigger === 'cancel') return { armed: false, dispatch: false };
  if (armed) return { armed: false, dispatch: true };
  return { armed: true, dispatch: false };
}
