import * as clack from '@clack/prompts';
import type { NewPostInput } from './types.js';
import { displayError } from './uiUtils.js';
import {
  advanceInit,
  advanceNewPost,
  startInit,
  startNewPost,
  type InitState,
  type NewPostState,
  type WizardEvent,
} from './wizard.js';

/** Fields already supplied as flags; their steps are answered without asking. */
export interface NewPostPreset {
  title?: string;
  description?: string;
  public?: boolean;
  /** Skip the final confirmation. */
  yes?: boolean;
}

export interface InitAnswers {
  name: string;
  location: string;
  createRepo: boolean;
}

/**
 * Converts a clack answer into a wizard event. clack returns a "cancel" symbol when the
 * user hits Esc/Ctrl+C.
 */
const toEvent = <T extends string | boolean>(answer: T | symbol): WizardEvent<T> =>
  clack.isCancel(answer) || typeof answer === 'symbol'
    ? { type: 'cancel' }
    : { type: 'submit', value: answer };

const askNewPostStep = async (
  state: NewPostState,
  preset: NewPostPreset
): Promise<WizardEvent<string | boolean>> => {
  switch (state.step) {
    case 'title':
      if (preset.title !== undefined && !state.error) return { type: 'submit', value: preset.title };
      if (state.error) displayError(state.error);
      return toEvent(
        await clack.text({
          message: "What's the title of your post?",
          placeholder: 'Enter your post title...',
          validate: (value) => {
            if (!value.trim()) return 'Title cannot be empty';
            if (value.length > 100) return 'Title must be at most 100 characters';
          },
        })
      );
    case 'description':
      if (preset.description !== undefined) return { type: 'submit', value: preset.description };
      return toEvent(
        await clack.text({
          message: 'Post description (optional):',
          placeholder: 'Enter post description...',
          defaultValue: '',
          validate: (value) => {
            if (value.length > 200) return 'Description must be at most 200 characters';
          },
        })
      );
    case 'visibility':
      if (preset.public !== undefined) return { type: 'submit', value: preset.public };
      return toEvent(
        await clack.confirm({
          message: 'Should this post be public?',
          initialValue: state.public,
        })
      );
    case 'confirm':
      if (preset.yes) return { type: 'submit', value: true };
      clack.note(
        [
          `Title:       ${state.title}`,
          ...(state.description ? [`Description: ${state.description}`] : []),
          `Visibility:  ${state.public ? 'Public' : 'Private'}`,
        ].join('\n'),
        'New post'
      );
      return toEvent(await clack.confirm({ message: 'Create this post?', initialValue: true }));
    default:
      return { type: 'cancel' };
  }
};

/**
 * Run the new-post wizard to completion. Resolves `null` when the user cancels.
 */
export const promptNewPost = async (
  defaultPublic: boolean,
  preset: NewPostPreset = {}
): Promise<NewPostInput | null> => {
  let state = startNewPost(defaultPublic);

  while (state.step !== 'done' && state.step !== 'cancelled') {
    state = advanceNewPost(state, await askNewPostStep(state, preset));
    // A rejected preset title falls through to a real prompt on the next round.
    if (state.error) preset = { ...preset, title: undefined };
  }

  if (state.step === 'cancelled') return null;
  return { title: state.title, description: state.description, public: state.public };
};

const askInitStep = async (state: InitState): Promise<WizardEvent<string | boolean>> => {
  switch (state.step) {
    case 'name':
      return toEvent(
        await clack.text({
          message: 'What should your blog be called?',
          placeholder: state.defaultName,
          defaultValue: state.defaultName,
        })
      );
    case 'location': {
      const fallback = state.defaultLocation(state.name);
      return toEvent(
        await clack.text({
          message: 'Where should your blog be created?',
          placeholder: fallback,
          defaultValue: fallback,
        })
      );
    }
    case 'createRepo':
      return toEvent(await clack.confirm({ message: 'Create GitHub repository?', initialValue: true }));
    default:
      return { type: 'cancel' };
  }
};

/**
 * Run the init wizard. Resolves `null` when the user cancels.
 */
export const promptInit = async (
  defaultName: string,
  defaultLocation: (name: string) => string
): Promise<InitAnswers | null> => {
  let state = startInit(defaultName, defaultLocation);

  while (state.step !== 'done' && state.step !== 'cancelled') {
    state = advanceInit(state, await askInitStep(state));
  }

  if (state.step === 'cancelled') return null;
  return { name: state.name, location: state.location, createRepo: state.createRepo };
};
