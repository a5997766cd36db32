import { describe, expect, it } from 'vitest';

import { capability } from '../src/core/capability.js';
import { Component } from '../src/core/component.js';
import { ComponentFacade } from '../src/core/facade.js';
import { Types } from '../src/core/type-ref.js';
import { Accepts, Implements } from '../src/decorators/index.js';
import { ComponentNotFoundError, InvalidCapabilityError } from '../src/errors/errors.js';

interface Mailer {
  send(to: string): string;
}

interface Bounce {
  bounced(to: string): void;
}

const MailerC = capability<Mailer>('Mailer', { send: [Types.String] });
const BounceC = capability<Bounce>('Bounce', { bounced: [Types.String] });

@Implements(MailerC, BounceC)
class SmtpMailer implements Mailer, Bounce {
  send(to: string): string {
    return `sent to ${to}`;
  }

  bounced(_to: string): void {}
}

class Newsletter {
  mailer?: Mailer;
  bounces: Bounce[] = [];

  @Accepts(MailerC)
  setMail(mailer: Mailer): void {
    this.mailer = mailer;
  }

  @Accepts(BounceC)
  register(bounce: Bounce): void {
    this.bounces.push(bounce);
  }

  @Accepts(BounceC)
  unregister(bounce: Bounce): void {
    this.bounces = this.bounces.filter((b) => b !== bounce);
  }
}

describe('ComponentFacade', () => {
  it('keeps components by id', () => {
    const mail = new Component(new SmtpMailer());
    const facade = new ComponentFacade().add('mail', mail);

    expect(facade.get('mail')).toBe(mail);
    expect(facade.has('mail')).toBe(true);
    expect(facade.get('other')).toBeUndefined();
    expect(facade.ids()).toEqual(['mail']);
  });

  it('hands out memoized proxies', () => {
    const facade = new ComponentFacade().add('mail', new Component(new SmtpMailer()));

    const proxy = facade.getProxy('mail', MailerC);

    expect(proxy.send('ops@example.test')).toBe('sent to ops@example.test');
    expect(facade.getProxy('mail', MailerC)).toBe(proxy);
  });

  it('reports unknown ids with the registered ones', () => {
    const facade = new ComponentFacade().add('mail', new Component(new SmtpMailer()));

    let error: unknown;
    try {
      facade.getProxy('post', MailerC);
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(ComponentNotFoundError);
    if (!(error instanceof ComponentNotFoundError)) return;
    expect(error.componentId).toBe('post');
    expect(error.availableComponents).toEqual(['mail']);
  });

  it('refuses capabilities the component does not implement', () => {
    const facade = new ComponentFacade().add('news', new Component(new Newsletter()));

    expect(() => facade.getProxy('news', MailerC)).toThrow(InvalidCapabilityError);
  });

  it('connects a consumer to a provider through its setter', () => {
    const newsletter = new Newsletter();
    const facade = new ComponentFacade()
      .add('mail', new Component(new SmtpMailer()))
      .add('news', new Component(newsletter));

    facade.connect('news', 'mail', MailerC);

    expect(newsletter.mailer?.send('reader@example.test')).toBe('sent to reader@example.test');
    expect(facade.get('news')?.getInjectedCapabilities('mail')).toEqual(new Set([MailerC]));
  });

  it('requires both ends of a connection to exist', () => {
    const facade = new ComponentFacade().add('news', new Component(new Newsletter()));

    expect(() => facade.connect('news', 'mail', MailerC)).toThrow(ComponentNotFoundError);
    expect(() => facade.connect('missing', 'news', MailerC)).toThrow(ComponentNotFoundError);
  });

  it('registers and unregisters listeners between components', () => {
    const newsletter = new Newsletter();
    const facade = new ComponentFacade()
      .add('mail', new Component(new SmtpMailer()))
      .add('news', new Component(newsletter));

    facade.register('news', 'mail');
    expect(newsletter.bounces).toHaveLength(1);

    facade.unregister('news', 'mail');
    expect(newsletter.bounces).toEqual([]);
  });
});
