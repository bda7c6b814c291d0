import { describe, it, expect, afterEach } from 'vitest';
import { cleanup, render, screen } from '@testing-library/react';
import { PaperDetails } from './PaperDetails';

afterEach(cleanup);

describe('PaperDetails', () => {
  it('prompts for a selection when nothing is selected', () => {
    render(<PaperDetails paper={null} />);
    expect(screen.getByText('Click a node to see paper details')).toBeTruthy();
  });

  it('shows the selected paper', () => {
    render(
      <PaperDetails
        paper={{
          paperId: 'W1',
          title: 'Attention Is All You Need',
          authors: [{ name: 'Ashish Vaswani' }, { name: 'Noam Shazeer' }],
          year: 2017,
          venue: 'NeurIPS',
          citationCount: 12345,
          url: 'https://example.org/attention',
        }}
        occurrences={3}
      />
    );

    expect(screen.getByTestId('paper-title').textContent).toBe('Attention Is All You Need');
    expect(screen.getByTestId('paper-authors').textContent).toBe('Ashish Vaswani, Noam Shazeer');
    expect(screen.getByTestId('paper-year').textContent).toBe('2017');
    expect(screen.getByTestId('paper-venue').textContent).toBe('NeurIPS');
    expect(screen.getByTestId('paper-citations').textContent).toBe('12,345 citations');
    expect(screen.getByTestId('paper-occurrences').textContent).toBe('Appears 3× in graph');
    expect(screen.getByRole('link').getAttribute('href')).toBe('https://example.org/attention');
  });

  it('falls back to Unknown for missing metadata', () => {
    render(<PaperDetails paper={{ paperId: 'W2', title: 'Untitled draft', authors: [], citationCount: 0 }} />);

    expect(screen.getByTestId('paper-authors').textContent).toBe('Unknown');
    expect(screen.getByTestId('paper-year').textContent).toBe('Unknown');
    expect(screen.getByTestId('paper-venue').textContent).toBe('Unknown');
    expect(screen.queryByTestId('paper-occurrences')).toBeNull();
    expect(screen.queryByRole('link')).toBeNull();
  });
});
