import { describe, test, expect } from 'vitest';
import { SessionNotFoundError, ValidationError } from '../src/utils/errors';
import { FixedClock, TOMORROW, buildTestAssistant, reachDateTime } from './helpers';

const CONFIRMED_REPLY = new RegExp(
  '^Excellent! Your booking is confirmed!\\n' +
  'Booking ID: [0-9a-f]{8}\\n' +
  'Service: Haircut\\n' +
  'Date: 2026-10-20\\n' +
  'Time: 09:00 AM\\n' +
  'Thank you for booking with Slotline!$'
);

// Deterministic PRNG so the interleaving test is repeatable.
function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

class FlakyClock extends FixedClock {
  failing = false;

  now(): Date {
    if (this.failing) {
      throw new Error('clock down');
    }
    return super.now();
  }
}

describe('BookingAssistant', () => {
  test('walks a caller from greeting to a confirmed booking', async () => {
    const { assistant } = await buildTestAssistant();

    const started = await assistant.startSession();
    expect(started.greetingText).toBe('Welcome to Slotline! Say hi to get started.');
    expect(started.state).toBe('greeting');

    const id = started.sessionId;
    expect((await assistant.sendMessage(id, 'Hi')).state).toBe('name');

    const named = await assistant.sendMessage(id, 'my name is Alice');
    expect(named.state).toBe('service');
    expect(named.replyText).toBe(
      'Nice to meet you, Alice! Here are our available services:\n' +
      '- Haircut ($25.0, 30 min)\n' +
      '- Consultation ($50.0, 60 min)\n' +
      '- Massage ($80.0, 90 min)\n\n' +
      'Which service would you like to book?'
    );

    expect((await assistant.sendMessage(id, 'Haircut')).state).toBe('datetime');

    const chosen = await assistant.sendMessage(id, 'tomorrow at 9 AM');
    expect(chosen.state).toBe('confirmation');
    expect(chosen.sessionSnapshot).toEqual({
      userName: 'Alice',
      selectedServiceName: 'Haircut',
      selectedDate: TOMORROW,
      selectedTime: '09:00 AM'
    });

    const confirmed = await assistant.sendMessage(id, 'yes');
    expect(confirmed.state).toBe('completed');
    expect(confirmed.replyText).toMatch(CONFIRMED_REPLY);

    const bookings = await assistant.listBookings();
    expect(bookings).toHaveLength(1);
    expect(bookings[0]).toMatchObject({
      userName: 'Alice',
      serviceName: 'Haircut',
      date: TOMORROW,
      time: '09:00 AM',
      status: 'confirmed'
    });
  });

  test('two callers racing for one slot get one booking', async () => {
    const { assistant, ledger } = await buildTestAssistant();
    const alice = await reachDateTime(assistant, 'Alice');
    const bob = await reachDateTime(assistant, 'Bob');

    expect((await assistant.sendMessage(alice, 'tomorrow at 9 AM')).state).toBe('confirmation');
    expect((await assistant.sendMessage(bob, 'tomorrow at 9 AM')).state).toBe('confirmation');

    const results = await Promise.all([
      assistant.sendMessage(alice, 'yes'),
      assistant.sendMessage(bob, 'yes')
    ]);

    expect(results.map(r => r.state).sort()).toEqual(['completed', 'datetime']);
    const loser = results.find(r => r.state === 'datetime');
    expect(loser?.replyText).toBe(
      'Sorry, 09:00 AM on 2026-10-20 was just booked by someone else. Which other date and time would you like?'
    );
    expect((await ledger.listAll()).filter(b => b.status === 'confirmed')).toHaveLength(1);
  });

  test('a later caller is told the slot is taken', async () => {
    const { assistant } = await buildTestAssistant();
    const alice = await reachDateTime(assistant, 'Alice');
    await assistant.sendMessage(alice, 'tomorrow at 9 AM');
    await assistant.sendMessage(alice, 'yes');

    const bob = await reachDateTime(assistant, 'Bob');
    const reply = await assistant.sendMessage(bob, 'tomorrow at 9 AM');

    expect(reply.state).toBe('datetime');
    expect(reply.replyText).toBe(
      'Sorry, 09:00 AM on 2026-10-20 is already booked. Still open that day: 10:00 AM, 11:00 AM, 02:00 PM, 03:00 PM, 04:00 PM'
    );
  });

  test('cancelling after a booking frees the slot', async () => {
    const { assistant, ledger, catalog } = await buildTestAssistant();
    const id = await reachDateTime(assistant, 'Alice');
    await assistant.sendMessage(id, 'tomorrow at 9 AM');
    await assistant.sendMessage(id, 'yes');

    const cancelled = await assistant.sendMessage(id, 'cancel my booking');
    expect(cancelled.replyText).toBe('Your bookings have been cancelled successfully.');
    expect(cancelled.state).toBe('greeting');

    const haircut = await catalog.findByName('Haircut');
    expect(haircut).not.toBeNull();
    expect(await ledger.isAvailable(haircut?.id ?? '', TOMORROW, '09:00 AM')).toBe(true);

    const listed = await assistant.sendMessage(id, 'my bookings');
    expect(listed.replyText).toBe('You have no active bookings.');
    expect(listed.state).toBe('greeting');
  });

  test('changing a booking releases the old slot and books a new one', async () => {
    const { assistant } = await buildTestAssistant();
    const id = await reachDateTime(assistant, 'Alice');
    await assistant.sendMessage(id, 'tomorrow at 9 AM');
    await assistant.sendMessage(id, 'yes');

    const update = await assistant.sendMessage(id, 'I want to change my booking');
    expect(update.state).toBe('datetime');
    expect(update.replyText).toBe(
      "Your previous booking is cancelled. Let's book a new slot for Haircut. Which date and time do you prefer?"
    );

    expect((await assistant.sendMessage(id, 'tomorrow at 2 PM')).state).toBe('confirmation');
    expect((await assistant.sendMessage(id, 'yes')).state).toBe('completed');

    const bookings = await assistant.listBookings();
    expect(bookings.map(b => [b.time, b.status])).toEqual([
      ['09:00 AM', 'cancelled'],
      ['02:00 PM', 'confirmed']
    ]);
  });

  test('changing with nothing booked keeps the conversation where it was', async () => {
    const { assistant } = await buildTestAssistant();
    const { sessionId } = await assistant.startSession();
    await assistant.sendMessage(sessionId, 'Hi');
    await assistant.sendMessage(sessionId, 'Alice');

    const reply = await assistant.sendMessage(sessionId, 'update');

    expect(reply.replyText).toBe("You have no bookings to update. Let's create a new booking.");
    expect(reply.state).toBe('service');
  });

  test('an unreadable name is asked for again', async () => {
    const { assistant } = await buildTestAssistant();
    const { sessionId } = await assistant.startSession();
    await assistant.sendMessage(sessionId, 'Hi');

    const reply = await assistant.sendMessage(sessionId, 'xyz123');

    expect(reply.replyText).toBe("I didn't catch your name. Could you tell me again?");
    expect(reply.state).toBe('name');
    expect(reply.sessionSnapshot.userName).toBeNull();
  });

  test('goodbye is final and repeatable', async () => {
    const { assistant } = await buildTestAssistant();
    const id = await reachDateTime(assistant, 'Alice');

    const first = await assistant.sendMessage(id, 'Bye');
    const second = await assistant.sendMessage(id, 'goodbye');
    const after = await assistant.sendMessage(id, 'Hi');

    expect(first.replyText).toBe('Goodbye! Thank you for using Slotline. Have a great day!');
    expect(second.replyText).toBe('Goodbye! Thank you for using Slotline. Have a great day!');
    expect(after.replyText).toBe('The session has ended. Please start a new session to continue.');
    expect([first.state, second.state, after.state]).toEqual(['ended', 'ended', 'ended']);
  });

  test('records both sides of every turn in order', async () => {
    const { assistant } = await buildTestAssistant();
    const { sessionId } = await assistant.startSession();
    await assistant.sendMessage(sessionId, '  Hi  ');
    await assistant.sendMessage(sessionId, 'I am Dana');

    const details = await assistant.getSession(sessionId);

    expect(details.state).toBe('service');
    expect(details.userName).toBe('Dana');
    expect(details.conversationHistory.map(turn => [turn.speaker, turn.text])).toEqual([
      ['user', 'Hi'],
      ['assistant', "Welcome to Slotline! I'm your booking assistant. What's your name?"],
      ['user', 'I am Dana'],
      ['assistant', expect.stringMatching(/^Nice to meet you, Dana!/)]
    ]);
  });

  test('turns sent together to one session are applied one at a time', async () => {
    const { assistant } = await buildTestAssistant();
    const { sessionId } = await assistant.startSession();

    const [first, second] = await Promise.all([
      assistant.sendMessage(sessionId, 'Hi'),
      assistant.sendMessage(sessionId, 'Alice')
    ]);

    expect(first.state).toBe('name');
    expect(second.state).toBe('service');
    expect((await assistant.getSession(sessionId)).conversationHistory).toHaveLength(4);
  });

  test('a failing clock does not break a confirmation turn', async () => {
    const clock = new FlakyClock();
    const { assistant } = await buildTestAssistant({ clock });
    const id = await reachDateTime(assistant, 'Alice');
    await assistant.sendMessage(id, 'tomorrow at 9 AM');

    clock.failing = true;
    const confirmed = await assistant.sendMessage(id, 'yes');

    expect(confirmed.state).toBe('completed');
    expect(confirmed.replyText).toMatch(CONFIRMED_REPLY);
    expect(await assistant.listBookings()).toHaveLength(1);
    expect((await assistant.sendMessage(id, 'my bookings')).replyText).toBe(
      'Here are your current bookings:\n- Haircut on 2026-10-20 at 09:00 AM'
    );
    expect((await assistant.getSession(id)).conversationHistory).toHaveLength(12);
  });

  test('unknown sessions are reported', async () => {
    const { assistant } = await buildTestAssistant();

    await expect(assistant.sendMessage('missing', 'Hi')).rejects.toBeInstanceOf(SessionNotFoundError);
    await expect(assistant.getSession('missing')).rejects.toBeInstanceOf(SessionNotFoundError);
  });

  test('services can be added and then booked', async () => {
    const { assistant } = await buildTestAssistant();

    const added = await assistant.addService({
      name: 'Beard Trim',
      durationMinutes: 15,
      price: 12.5,
      availableSlots: ['10:30 am']
    });
    expect(added.availableSlots).toEqual(['10:30 AM']);
    expect((await assistant.listServices()).map(s => s.name)).toEqual(['Haircut', 'Consultation', 'Massage', 'Beard Trim']);

    const id = await reachDateTime(assistant, 'Alice', 'beard trim');
    const reply = await assistant.sendMessage(id, 'tomorrow at 10:30am');
    expect(reply.state).toBe('confirmation');

    await expect(assistant.addService({ name: 'Broken', price: 5 })).rejects.toBeInstanceOf(ValidationError);
  });

  test('management can cancel a booking by id', async () => {
    const { assistant } = await buildTestAssistant();
    const id = await reachDateTime(assistant, 'Alice');
    await assistant.sendMessage(id, 'tomorrow at 9 AM');
    await assistant.sendMessage(id, 'yes');
    const [booking] = await assistant.listBookings();

    const cancelled = await assistant.cancelBooking(booking.id);

    expect(cancelled.status).toBe('cancelled');
    expect((await assistant.sendMessage(id, 'my bookings')).replyText).toBe('You have no active bookings.');
  });

  test('never confirms two bookings for one slot under interleaved sessions', async () => {
    const { assistant, ledger } = await buildTestAssistant();
    const random = mulberry32(42);
    const names = ['Alice', 'Bruno', 'Carla', 'Dmitri', 'Elena', 'Farid'];
    const times = ['9 AM', '10 AM', '11 AM'];

    const sessions = await Promise.all(names.map(name => reachDateTime(assistant, name)));

    const outcomes = await Promise.all(sessions.map(async sessionId => {
      for (let attempt = 0; attempt < 5; attempt++) {
        const time = times[Math.floor(random() * times.length)];
        const picked = await assistant.sendMessage(sessionId, `tomorrow at ${time}`);
        if (picked.state !== 'confirmation') {
          continue;
        }
        const result = await assistant.sendMessage(sessionId, 'yes');
        if (result.state === 'completed') {
          return 'completed';
        }
      }
      return 'gave up';
    }));

    const confirmed = (await ledger.listAll()).filter(b => b.status === 'confirmed');
    const keys = confirmed.map(b => `${b.serviceId}|${b.date}|${b.time}`);
    expect(new Set(keys).size).toBe(keys.length);
    expect(confirmed.length).toBeLessThanOrEqual(times.length);
    expect(outcomes.filter(o => o === 'completed')).toHaveLength(confirmed.length);
  });
});
