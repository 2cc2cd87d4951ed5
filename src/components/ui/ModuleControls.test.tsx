import { describe, it, expect, afterEach, vi } from 'vitest';
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import { MAX_SPEED, MIN_SPEED } from '@/lib/fifo/config';
import ModuleControls from './ModuleControls';

function renderControls(isRunning: boolean) {
  const handlers = {
    onStart: vi.fn(),
    onCancel: vi.fn(),
    onEnqueue: vi.fn(),
    onReset: vi.fn(),
    onSpeedChange: vi.fn(),
  };
  render(<ModuleControls isRunning={isRunning} speed={1} {...handlers} />);
  return handlers;
}

describe('ModuleControls', () => {
  afterEach(() => {
    cleanup();
  });

  it('offers start and enqueue while idle', () => {
    const handlers = renderControls(false);

    fireEvent.click(screen.getByRole('button', { name: 'Add Process' }));
    fireEvent.click(screen.getByRole('button', { name: 'Start Simulation' }));

    expect(handlers.onEnqueue).toHaveBeenCalledTimes(1);
    expect(handlers.onStart).toHaveBeenCalledTimes(1);
    expect(screen.queryByRole('button', { name: 'Cancel Simulation' })).toBeNull();
  });

  it('locks enqueue and swaps start for cancel while running', () => {
    const handlers = renderControls(true);

    const add = screen.getByRole('button', { name: 'Add Process' });
    expect(add.hasAttribute('disabled')).toBe(true);
    expect(screen.queryByRole('button', { name: 'Start Simulation' })).toBeNull();

    fireEvent.click(screen.getByRole('button', { name: 'Cancel Simulation' }));
    expect(handlers.onCancel).toHaveBeenCalledTimes(1);
  });

  it('maps the slider position to a power-of-two speed', () => {
    const handlers = renderControls(false);

    fireEvent.change(screen.getByRole('slider', { name: 'Speed' }), { target: { value: '1' } });

    expect(handlers.onSpeedChange).toHaveBeenCalledWith(2);
  });

  it('bounds the slider by the supported speed range', () => {
    renderControls(false);

    const slider = screen.getByRole('slider', { name: 'Speed' });
    expect(slider.getAttribute('min')).toBe(String(Math.log2(MIN_SPEED)));
    expect(slider.getAttribute('max')).toBe(String(Math.log2(MAX_SPEED)));
  });
});
