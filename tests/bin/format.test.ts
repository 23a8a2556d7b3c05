import { describe, expect, test } from 'vitest';
import { formatCompletedTasks, formatTasks, numberTasks } from '@/bin/format';
import type { CompletedTask, Task } from '@/types';

const milk: Task = {
  id: 4,
  title: 'Buy milk',
  description: '2% milk',
  timeCreated: '2024-05-01 09:30:00',
};

const dog: Task = {
  id: 9,
  title: 'Walk dog',
  description: '',
  timeCreated: '2024-05-02 18:00:00',
};

describe('formatTasks', () => {
  test('renders a heading, header, divider and one row per task', () => {
    expect(formatTasks('Tasks:', numberTasks([milk, dog]))).toBe(
      [
        'Tasks:',
        '#    Task Title          Task Description    Time Created (UTC)',
        '-'.repeat(65),
        '1    Buy milk            2% milk             2024-05-01 09:30:00',
        '2    Walk dog                                2024-05-02 18:00:00',
      ].join('\n'),
    );
  });

  test('uses the given task number, not the id', () => {
    const lines = formatTasks('Task:', [{ number: 7, task: milk }]).split('\n');
    expect(lines[0]).toBe('Task:');
    expect(lines[3]).toBe('7    Buy milk            2% milk             2024-05-01 09:30:00');
  });

  test('does not truncate long cells', () => {
    const long: Task = { ...milk, title: 'A very long task title here', description: 'x' };
    const lines = formatTasks('Task:', [{ number: 3, task: long }]).split('\n');
    expect(lines[3]).toBe('3    A very long task title herex                   2024-05-01 09:30:00');
  });
});

describe('formatCompletedTasks', () => {
  test('adds the completion time column', () => {
    const done: CompletedTask = { ...milk, id: 1, timeCompleted: '2024-05-03 08:00:00' };
    expect(formatCompletedTasks('Completed tasks:', numberTasks([done]))).toBe(
      [
        'Completed tasks:',
        '#    Task Title          Task Description    Time Created (UTC)  Time Completed (UTC)',
        '-'.repeat(85),
        '1    Buy milk            2% milk             2024-05-01 09:30:00 2024-05-03 08:00:00',
      ].join('\n'),
    );
  });
});

describe('numberTasks', () => {
  test('numbers from 1 in the order given', () => {
    expect(numberTasks([dog, milk]).map(({ number, task }) => [number, task.id])).toEqual([
      [1, 9],
      [2, 4],
    ]);
  });
});
