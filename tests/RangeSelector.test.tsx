import { describe, it, expect, vi } from 'vitest';
import { fireEvent, render, screen } from '@testing-library/react';
import React from 'react';
import RangeSelector from '../components/RangeSelector';
import type { ModeState } from '../types';

const NOW = new Date(2024, 2, 15, 10, 30).getTime();
const today: ModeState = { kind: 'today', fromTime: '00:00', toTime: '10:30' };

describe('RangeSelector', () => {
  it('applies a valid realtime refresh interval', () => {
    const onSelect = vi.fn();
    render(<RangeSelector mode={today} availableYears={[]} now={NOW} onSelect={onSelect} />);

    fireEvent.click(screen.getByText('Real Time'));
    fireEvent.change(screen.getByLabelText('Refresh every (s):'), { target: { value: '5' } });
    fireEvent.click(screen.getByText('Apply'));

    expect(onSelect).toHaveBeenCalledWith({ kind: 'realtime', refreshIntervalMs: 5000 });
  });

  it('rejects a refresh interval above 60 seconds', () => {
    const onSelect = vi.fn();
    render(<RangeSelector mode={today} availableYears={[]} now={NOW} onSelect={onSelect} />);

    fireEvent.click(screen.getByText('Real Time'));
    fireEvent.change(screen.getByLabelText('Refresh every (s):'), { target: { value: '75' } });
    fireEvent.click(screen.getByText('Apply'));

    expect(screen.getByRole('alert')).toHaveTextContent('Refresh interval must be between 1 and 60 seconds.');
    expect(onSelect).not.toHaveBeenCalled();
  });

  it('applies the Today window', () => {
    const onSelect = vi.fn();
    render(<RangeSelector mode={today} availableYears={[]} now={NOW} onSelect={onSelect} />);

    fireEvent.change(screen.getByLabelText('From time'), { target: { value: '06:00' } });
    fireEvent.click(screen.getByText('Apply'));

    expect(onSelect).toHaveBeenCalledWith({ kind: 'today', fromTime: '06:00', toTime: '10:30' });
  });

  it('selects a single day', () => {
    const onSelect = vi.fn();
    render(<RangeSelector mode={today} availableYears={[]} now={NOW} onSelect={onSelect} />);

    fireEvent.click(screen.getByText('Day'));
    fireEvent.change(screen.getByLabelText('Day'), { target: { value: '2024-03-10' } });
    fireEvent.click(screen.getByText('Apply'));

    expect(onSelect).toHaveBeenCalledWith({ kind: 'day', date: '2024-03-10' });
  });

  it('refuses a range that ends before it starts', () => {
    const onSelect = vi.fn();
    render(<RangeSelector mode={today} availableYears={[]} now={NOW} onSelect={onSelect} />);

    fireEvent.click(screen.getByText('Range'));
    fireEvent.change(screen.getByLabelText('From date'), { target: { value: '2024-03-10' } });
    fireEvent.change(screen.getByLabelText('To date'), { target: { value: '2024-03-01' } });
    fireEvent.click(screen.getByText('Apply'));

    expect(screen.getByRole('alert')).toHaveTextContent('Choose a start date on or before the end date.');
    expect(onSelect).not.toHaveBeenCalled();
  });

  it('offers a shortcut per available year', () => {
    const onSelect = vi.fn();
    render(<RangeSelector mode={today} availableYears={[2023, 2024]} now={NOW} onSelect={onSelect} />);

    fireEvent.click(screen.getByText('Range'));
    fireEvent.click(screen.getByText('2023'));

    expect(onSelect).toHaveBeenCalledWith({ kind: 'range', fromDate: '2023-01-01', toDate: '2023-12-31', year: 2023 });
  });
});
