import type { AppSettings } from '../../types';
import { AnystyleTagger } from './anystyleTagger';
import { SequenceTagger } from './sequenceTagger';
import type { Tagger } from './tagger';

export function createTagger(settings: AppSettings): Tagger {
  switch (settings.tagging.tagger) {
    case 'anystyle':
      return new AnystyleTagger({
        command: settings.anystyle.command,
        cjkModelPath: settings.anystyle.cjkModelPath,
      });
    case 'builtin':
      return settings.tagging.modelPath
        ? SequenceTagger.fromFile(settings.tagging.modelPath)
        : new SequenceTagger();
  }
}
