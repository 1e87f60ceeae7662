import { BaseBuilder } from './BaseBuilder';
import { MarkupElement } from './MarkupElement';

/**
 * Fluent builder for a one-level markup tree
 *
 * @example
 * MarkupBuilder.create('ul').addChild('li', 'hello').addChild('li', 'world').render();
 */
export class MarkupBuilder extends BaseBuilder<MarkupElement> {
  private root: MarkupElement;

  constructor(private readonly rootName: string) {
    super();
    this.root = new MarkupElement(rootName);
  }

  static create(rootName: string): MarkupBuilder {
    return new MarkupBuilder(rootName);
  }

  /**
   * Append a leaf element to the root
   */
  addChild(childName: string, childText: string): this {
    this.root.children.push(MarkupElement.create(childName, childText));
    return this;
  }

  /**
   * Drop every child, keeping the root name
   */
  reset(): this {
    this.root = new MarkupElement(this.rootName);
    return this;
  }

  render(): string {
    return this.root.render();
  }

  build(): MarkupElement {
    return this.root;
  }

  protected toPlainObject(value: MarkupElement): unknown {
    return value.toNode();
  }

  toString(): string {
    return this.render();
  }
}
