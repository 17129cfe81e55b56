import { PriorityQueue } from '../../utils/priorityQueue';

describe('PriorityQueue', () => {
  it('should pop items in comparator order', () => {
    const queue = new PriorityQueue<number>((a, b) => b - a);
    [5, 1, 9, 3, 7, 9, 2].forEach(n => queue.push(n));

    const popped: number[] = [];
    for (let n = queue.pop(); n !== undefined; n = queue.pop()) {
      popped.push(n);
    }

    expect(popped).toEqual([9, 9, 7, 5, 3, 2, 1]);
  });

  it('should report size and peek without removing', () => {
    const queue = new PriorityQueue<string>((a, b) => a.localeCompare(b));
    queue.push('b');
    queue.push('a');

    expect(queue.size).toBe(2);
    expect(queue.peek()).toBe('a');
    expect(queue.size).toBe(2);
  });

  it('should return undefined when empty', () => {
    const queue = new PriorityQueue<number>((a, b) => a - b);

    expect(queue.isEmpty()).toBe(true);
    expect(queue.pop()).toBeUndefined();
    expect(queue.peek()).toBeUndefined();
  });
});
