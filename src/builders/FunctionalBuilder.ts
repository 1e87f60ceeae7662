import { BaseBuilder } from './BaseBuilder';

/**
 * A deferred transformation of the subject
 */
export type BuildStep<TSubject> = (subject: TSubject) => TSubject;

/**
 * Builder that records mutations and replays them on a fresh subject
 * each time it builds.
 */
export abstract class FunctionalBuilder<TSubject> extends BaseBuilder<TSubject> {
  private readonly steps: BuildStep<TSubject>[] = [];

  constructor(private readonly createSubject: () => TSubject) {
    super();
  }

  /**
   * Queue a mutation of the subject
   */
  do(action: (subject: TSubject) => void): this {
    this.steps.push(subject => {
      action(subject);
      return subject;
    });
    return this;
  }

  get stepCount(): number {
    return this.steps.length;
  }

  build(): TSubject {
    return this.steps.reduce((subject, step) => step(subject), this.createSubject());
  }
}
