/**
 * Step-by-step field collection for `new` and `init`, modelled as plain state machines.
 *
 * Each machine is a state (current step + the answers collected so far) and a pure
 * `advance(state, event)` function. Nothing here touches the terminal; `prompts.ts` asks
 * the questions and feeds the answers back in as events.
 */

export type WizardEvent<TAnswer> = { type: 'submit'; value: TAnswer } | { type: 'cancel' };

// New post: title -> description -> visibility -> confirm

export type NewPostStep = 'title' | 'description' | 'visibility' | 'confirm' | 'done' | 'cancelled';

export interface NewPostState {
  step: NewPostStep;
  title: string;
  description: string;
  public: boolean;
  /** Validation message for the current step, cleared on the next accepted answer. */
  error?: string;
}

/** Answer types per step: text for the two text fields, yes/no for the rest. */
export type NewPostAnswer = string | boolean;

export const startNewPost = (defaultPublic: boolean): NewPostState => ({
  step: 'title',
  title: '',
  description: '',
  public: defaultPublic,
});

export const advanceNewPost = (
  state: NewPostState,
  event: WizardEvent<NewPostAnswer>
): NewPostState => {
  if (state.step === 'done' || state.step === 'cancelled') return state;
  if (event.type === 'cancel') return { ...state, step: 'cancelled', error: undefined };

  const { value } = event;
  switch (state.step) {
    case 'title': {
      const title = typeof value === 'string' ? value.trim() : '';
      if (!title) return { ...state, error: 'Title cannot be empty' };
      return { ...state, title, step: 'description', error: undefined };
    }
    case 'description':
      return {
        ...state,
        description: typeof value === 'string' ? value.trim() : '',
        step: 'visibility',
        error: undefined,
      };
    case 'visibility':
      return {
        ...state,
        public: typeof value === 'boolean' ? value : state.public,
        step: 'confirm',
        error: undefined,
      };
    case 'confirm':
      return { ...state, step: value === true ? 'done' : 'cancelled', error: undefined };
    default:
      return state;
  }
};

// Init: name -> location -> createRepo

export type InitStep = 'name' | 'location' | 'createRepo' | 'done' | 'cancelled';

export interface InitState {
  step: InitStep;
  name: string;
  location: string;
  createRepo: boolean;
  defaultName: string;
  /** Builds the default location from the chosen name. */
  defaultLocation: (name: string) => string;
}

export const startInit = (
  defaultName: string,
  defaultLocation: (name: string) => string
): InitState => ({
  step: 'name',
  name: '',
  location: '',
  createRepo: true,
  defaultName,
  defaultLocation,
});

export const advanceInit = (state: InitState, event: WizardEvent<string | boolean>): InitState => {
  if (state.step === 'done' || state.step === 'cancelled') return state;
  if (event.type === 'cancel') return { ...state, step: 'cancelled' };

  const text = typeof event.value === 'string' ? event.value.trim() : '';
  switch (state.step) {
    case 'name':
      // Empty answer takes the default.
      return { ...state, name: text || state.defaultName, step: 'location' };
    case 'location':
      return { ...state, location: text || state.defaultLocation(state.name), step: 'createRepo' };
    case 'createRepo':
      return {
        ...state,
        createRepo: typeof event.value === 'boolean' ? event.value : state.createRepo,
        step: 'done',
      };
    default:
      return state;
  }
};
