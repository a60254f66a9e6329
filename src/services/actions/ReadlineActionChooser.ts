import { createInterface, Interface } from 'readline';
import { ACTION_TYPES, ActionType } from '../../types/models.js';
import { ShowAssessment } from '../reconciliation/types.js';
import { ActionChooser } from './ActionDispatcher.js';

/**
 * Terminal prompts for interactive runs. When the input stream ends every
 * pending and later prompt answers "keep".
 */
export class ReadlineActionChooser implements ActionChooser {
  private rl: Interface | null = null;
  private closed = false;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  async choose(assessment: ShowAssessment): Promise<ActionType> {
    const { show, recommendedAction } = assessment;
    const seasons = assessment.downloadedSeasons.length > 0 ? assessment.downloadedSeasons.join(', ') : 'none';

    this.output.write(`\n${show.title}${show.year !== null ? ` (${show.year})` : ''}\n`);
    this.output.write(`  seasons on disk: ${seasons}\n`);
    ACTION_TYPES.forEach((action, index) => {
      const marker = action === recommendedAction ? ' (recommended)' : '';
      this.output.write(`  ${index + 1}) ${action}${marker}\n`);
    });

    for (;;) {
      const answer = await this.ask(`Action [${recommendedAction}]: `);
      if (answer === null) {
        return 'keep';
      }
      if (answer === '') {
        return recommendedAction;
      }

      const action = parseAction(answer);
      if (action) {
        return action;
      }
      this.output.write(`  Unknown choice "${answer}"\n`);
    }
  }

  async confirm(assessment: ShowAssessment, action: ActionType, steps: string[]): Promise<boolean> {
    this.output.write(`  ${action} will run:\n`);
    for (const step of steps) {
      this.output.write(`    - ${step}\n`);
    }

    const answer = await this.ask(`Proceed with ${action} for "${assessment.show.title}"? [y/N]: `);
    return answer !== null && /^y(es)?$/i.test(answer);
  }

  close(): void {
    if (!this.closed) {
      this.rl?.close();
    }
    this.rl = null;
  }

  private ask(question: string): Promise<string | null> {
    if (this.closed) {
      return Promise.resolve(null);
    }

    const rl = this.getInterface();
    return new Promise((resolve) => {
      const onClose = (): void => resolve(null);
      rl.once('close', onClose);
      rl.question(question, (answer) => {
        rl.off('close', onClose);
        resolve(answer.trim());
      });
    });
  }

  private getInterface(): Interface {
    if (!this.rl) {
      const rl = createInterface({ input: this.input, output: this.output, terminal: false });
      rl.on('close', () => {
        this.closed = true;
      });
      this.rl = rl;
    }
    return this.rl;
  }
}

function parseAction(answer: string): ActionType | null {
  const index = Number(answer);
  if (Number.isInteger(index) && index >= 1 && index <= ACTION_TYPES.length) {
    return ACTION_TYPES[index - 1] ?? null;
  }
  const normalized = answer.toLowerCase().replace(/[\s-]+/g, '_');
  return ACTION_TYPES.find((action) => action === normalized) ?? null;
}
