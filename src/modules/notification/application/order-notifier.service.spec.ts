import { describe, it, expect, vi, beforeEach } from 'vitest';
import { OrderNotifier } from './order-notifier.service';
import { NotifierRegistry } from './notifier.registry';
import { EmailNotifier } from '../infrastructure/email.notifier';
import { SmsNotifier } from '../infrastructure/sms.notifier';
import { RecordingOutputSink } from '../../../shared/testing/recording-output.sink';
import {
  DeliveryError,
  InvalidOrderError,
  UnknownNotifierError,
} from '../../../shared/domain/errors';
import { fail } from '../../../shared/domain/result';
import type { Notifier } from '../../../shared/ports/notifier.port';
import type { Order } from '../domain/order';

describe('OrderNotifier', () => {
  let sink: RecordingOutputSink;
  let email: EmailNotifier;
  let sms: SmsNotifier;
  let registry: NotifierRegistry;
  let orderNotifier: OrderNotifier;

  beforeEach(() => {
    sink = new RecordingOutputSink();
    email = new EmailNotifier(sink);
    sms = new SmsNotifier(sink);
    registry = new NotifierRegistry('email').register(email).register(sms).seal();
    orderNotifier = new OrderNotifier(registry);
  });

  describe('Default routing', () => {
    it('should use the default notifier when none is given', () => {
      const result = orderNotifier.notify({ id: 101 });

      expect(result).toEqual({ success: true, value: undefined });
      expect(sink.lines).toEqual(['Sending email: Order #101 confirmed!']);
    });

    it('should follow the configured default', () => {
      const smsDefault = new NotifierRegistry('sms')
        .register(email)
        .register(sms)
        .seal();

      new OrderNotifier(smsDefault).notify({ id: 7 });

      expect(sink.lines).toEqual(['Sending sms: Order #7 confirmed!']);
    });
  });

  describe('Explicit routing', () => {
    it('should use the supplied notifier', () => {
      const result = orderNotifier.notify({ id: 101 }, sms);

      expect(result.success).toBe(true);
      expect(sink.lines).toEqual(['Sending sms: Order #101 confirmed!']);
    });

    it('should call send exactly once with the confirmation message', () => {
      const sendSpy = vi.spyOn(sms, 'send');
      const defaultSpy = vi.spyOn(email, 'send');

      orderNotifier.notify({ id: 42 }, sms);

      expect(sendSpy).toHaveBeenCalledTimes(1);
      expect(sendSpy).toHaveBeenCalledWith('Order #42 confirmed!');
      expect(defaultSpy).not.toHaveBeenCalled();
    });
  });

  describe('Substitutability', () => {
    it('should return the same result shape for every registered notifier', () => {
      const results = registry.names().map((name) => orderNotifier.notifyVia({ id: 3 }, name));

      expect(results).toEqual([
        { success: true, value: undefined },
        { success: true, value: undefined },
      ]);
    });

    it('should build the same message whichever notifier is chosen', () => {
      const emailSpy = vi.spyOn(email, 'send');
      const smsSpy = vi.spyOn(sms, 'send');

      orderNotifier.notify({ id: 'X-1' }, email);
      orderNotifier.notify({ id: 'X-1' }, sms);

      expect(emailSpy.mock.calls[0][0]).toBe('Order #X-1 confirmed!');
      expect(smsSpy.mock.calls[0][0]).toBe('Order #X-1 confirmed!');
    });
  });

  describe('UNKNOWN_NOTIFIER', () => {
    it('should reject an unregistered notifier without producing output', () => {
      const stranger = new SmsNotifier(sink);
      const sendSpy = vi.spyOn(stranger, 'send');

      const result = orderNotifier.notify({ id: 101 }, stranger);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(UnknownNotifierError);
        expect(result.error.code).toBe('UNKNOWN_NOTIFIER');
        expect(result.error.message).toBe('Notifier "sms" is not registered');
      }
      expect(sendSpy).not.toHaveBeenCalled();
      expect(sink.lines).toEqual([]);
    });

    it('should not fall back to the default notifier', () => {
      const emailSpy = vi.spyOn(email, 'send');
      const stranger: Notifier = { channel: 'fax', send: vi.fn() };

      orderNotifier.notify({ id: 1 }, stranger);

      expect(emailSpy).not.toHaveBeenCalled();
    });

    it('should reject an unknown name in notifyVia', () => {
      const result = orderNotifier.notifyVia({ id: 1 }, 'pigeon');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(UnknownNotifierError);
      }
      expect(sink.lines).toEqual([]);
    });
  });

  describe('INVALID_ORDER', () => {
    it('should reject an order without an identifier', () => {
      const order = JSON.parse('{"customer": "Ana"}') as Order;

      const result = orderNotifier.notify(order);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(InvalidOrderError);
      }
      expect(sink.lines).toEqual([]);
    });
  });

  describe('DELIVERY_FAILED', () => {
    it('should return the delivery error unchanged', () => {
      sink.available = false;

      const result = orderNotifier.notify({ id: 101 }, sms);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(DeliveryError);
        expect(result.error.message).toBe(
          'Delivery via sms failed: sink unavailable',
        );
      }
    });

    it('should pass the notifier result through as the same object', () => {
      const failure = fail(new DeliveryError('down', 'sms'));
      vi.spyOn(sms, 'send').mockReturnValue(failure);

      expect(orderNotifier.notify({ id: 9 }, sms)).toBe(failure);
    });
  });
});
