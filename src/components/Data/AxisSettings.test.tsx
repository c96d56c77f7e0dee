// @vitest-environment jsdom
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import { Provider, createStore } from 'jotai';
import { AxisSettings } from './AxisSettings';
import { timeWindowSecondsAtom, validationMessageAtom } from '../../store/atoms';
import { startSessionAtom } from '../../store/session';

describe('AxisSettings', () => {
  let store: ReturnType<typeof createStore>;

  beforeEach(() => {
    store = createStore();
    store.set(startSessionAtom, { sensors: ['pressureTemperature'] });
    render(
      <Provider store={store}>
        <AxisSettings />
      </Provider>
    );
  });

  afterEach(() => {
    cleanup();
  });

  it('rolls the field back when the text does not parse', () => {
    const input = screen.getByLabelText('Time Window (s)');

    fireEvent.change(input, { target: { value: 'abc' } });
    fireEvent.blur(input);

    expect(input).toHaveProperty('value', '20');
    expect(store.get(validationMessageAtom)).toBe('Time Window must be a valid positive number.');
  });

  it('commits on Enter', () => {
    const input = screen.getByLabelText('Time Window (s)');

    fireEvent.change(input, { target: { value: '30' } });
    fireEvent.keyDown(input, { key: 'Enter' });

    expect(store.get(timeWindowSecondsAtom)).toBe(30);
    expect(input).toHaveProperty('value', '30');
  });

  it('locks the Y bounds while auto range is on', () => {
    expect(screen.getByLabelText('Y Min (°C)')).toHaveProperty('disabled', false);

    fireEvent.click(screen.getByLabelText('Auto Y range'));

    expect(screen.getByLabelText('Y Min (°C)')).toHaveProperty('disabled', true);
    expect(screen.getByLabelText('Y Max (°C)')).toHaveProperty('disabled', true);
  });

  it('shows the applied rate next to the requested one', () => {
    expect(screen.getByText('Applied: 51.20 Hz (divider 640)')).toBeTruthy();
  });
});
