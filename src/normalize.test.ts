import { describe, it, expect, vi } from 'vitest';
import { ApiError, DecodeError, ShapeError } from './errors.js';
import { normalize, translateCodes } from './normalize.js';
import { OPERATIONS } from './operations.js';

const billResponse = {
  status: 'OK',
  bill: {
    bill_id: 101,
    bill_number: 'HB1',
    state: 'IL',
    status: 2,
    bill_type_id: '1',
    body: 'H',
    current_body: 'S',
    progress: [
      { date: '2025-01-10', event: 1 },
      { date: '2025-03-01', event: 2 }
    ],
    sponsors: [{ people_id: 7, name: 'Test Person', party_id: '1', role_id: 1, sponsor_type_id: 1 }],
    texts: [{ doc_id: 55, type_id: 1, mime_id: 2 }],
    votes: [{ roll_call_id: 900, chamber: 'H', passed: 1 }],
    subjects: [{ subject_id: 3, subject_name: 'Budget' }]
  }
};

describe('normalize', () => {
  it('returns the payload with code labels added', () => {
    const bill = normalize(OPERATIONS.getBill, JSON.stringify(billResponse));

    expect(bill).toEqual({
      ...billResponse.bill,
      status_desc: 'Engrossed',
      bill_type_desc: 'Bill',
      body_desc: 'House',
      current_body_desc: 'Senate',
      progress: [
        { date: '2025-01-10', event: 1, event_desc: 'Introduced' },
        { date: '2025-03-01', event: 2, event_desc: 'Engrossed' }
      ],
      sponsors: [
        {
          people_id: 7,
          name: 'Test Person',
          party_id: '1',
          party_desc: 'Democrat',
          role_id: 1,
          role_desc: 'Representative / Lower Chamber',
          sponsor_type_id: 1,
          sponsor_type_desc: 'Primary Sponsor'
        }
      ],
      texts: [{ doc_id: 55, type_id: 1, type_desc: 'Introduced', mime_id: 2, mime_desc: 'PDF' }],
      votes: [{ roll_call_id: 900, chamber: 'H', chamber_desc: 'House', passed: 1 }]
    });
  });

  it('skips code translation when asked to', () => {
    const bill = normalize(OPERATIONS.getBill, JSON.stringify(billResponse), { translate: false });

    expect(bill).toEqual(billResponse.bill);
    expect(bill).not.toHaveProperty('status_desc');
  });

  it('returns lists for list operations', () => {
    const body = JSON.stringify({
      status: 'OK',
      sessions: [
        { session_id: 2011, state_id: 13, year_start: 2025, year_end: 2026, session_name: '104th General Assembly' }
      ]
    });

    const sessions = normalize(OPERATIONS.getSessionList, body);

    expect(sessions).toHaveLength(1);
    expect(sessions[0].session_id).toBe(2011);
  });

  it('splits the master list into session and bills, labelling unknown codes', () => {
    const onUnknownCode = vi.fn();
    const body = JSON.stringify({
      status: 'OK',
      masterlist: {
        session: { session_id: 2011, session_name: '104th General Assembly' },
        '0': { bill_id: 1, number: 'HB1', status: 1 },
        '1': { bill_id: 2, number: 'SB2', status: 42 }
      }
    });

    const masterList = normalize(OPERATIONS.getMasterList, body, { onUnknownCode });

    expect(masterList.session.session_id).toBe(2011);
    expect(masterList.bills.map(bill => bill.status_desc)).toEqual(['Introduced', 'Unknown']);
    expect(onUnknownCode).toHaveBeenCalledOnce();
    expect(onUnknownCode).toHaveBeenCalledWith('status', 42, 'status');
  });

  it('collects numbered search results', () => {
    const body = JSON.stringify({
      status: 'OK',
      searchresult: {
        summary: { count: 2, page_current: 1, page_total: 1 },
        '0': { relevance: 90, bill_id: 1, bill_number: 'HB1' },
        '1': { relevance: 40, bill_id: 2, bill_number: 'HB2' }
      }
    });

    const { summary, results } = normalize(OPERATIONS.search, body);

    expect(summary.count).toBe(2);
    expect(results.map(result => result.bill_id)).toEqual([1, 2]);
  });

  it('raises ApiError with the API message when status is ERROR', () => {
    const body = JSON.stringify({ status: 'ERROR', alert: { message: 'Unknown bill id: 999' } });

    expect(() => normalize(OPERATIONS.getBill, body)).toThrow(ApiError);
    expect(() => normalize(OPERATIONS.getBill, body)).toThrow('getBill: Unknown bill id: 999');
    try {
      normalize(OPERATIONS.getBill, body);
    } catch (err) {
      expect(err).toMatchObject({ operation: 'getBill', apiMessage: 'Unknown bill id: 999' });
    }
  });

  it.each([
    ['no alert', { status: 'ERROR' }],
    ['an alert without a message', { status: 'ERROR', alert: { msg: 'Invalid API key' } }],
    ['an alert that is a string', { status: 'ERROR', alert: 'Invalid API key' }],
    ['a null message', { status: 'ERROR', alert: { message: null } }]
  ])('falls back to the status for an ERROR with %s', (_case, document) => {
    const body = JSON.stringify(document);

    expect(() => normalize(OPERATIONS.getBill, body)).toThrow(
      new ApiError('getBill', 'API returned status ERROR')
    );
  });

  it('raises ShapeError when a master list has no session', () => {
    const body = JSON.stringify({ status: 'OK', masterlist: { '0': { bill_id: 1, number: 'HB1' } } });

    expect(() => normalize(OPERATIONS.getMasterList, body)).toThrow(
      new ShapeError('getMasterList', 'payload is missing "session"')
    );
  });

  it('raises ShapeError when search results have no summary', () => {
    const body = JSON.stringify({ status: 'OK', searchresult: { '0': { relevance: 90, bill_id: 1 } } });

    expect(() => normalize(OPERATIONS.search, body)).toThrow(
      new ShapeError('search', 'payload is missing "summary"')
    );
  });

  it('raises ShapeError when the payload key is missing', () => {
    expect(() => normalize(OPERATIONS.getBill, JSON.stringify({ status: 'OK' }))).toThrow(
      new ShapeError('getBill', 'response is missing "bill"')
    );
  });

  it('raises ShapeError when the document has no status', () => {
    expect(() => normalize(OPERATIONS.getBill, JSON.stringify([1, 2]))).toThrow(ShapeError);
  });

  it('raises ShapeError when the payload does not match', () => {
    const body = JSON.stringify({ status: 'OK', bill: { bill_id: 101 } });

    expect(() => normalize(OPERATIONS.getBill, body)).toThrow(ShapeError);
    expect(() => normalize(OPERATIONS.getBill, body)).toThrow(/bill_number/);
  });

  it('raises DecodeError for a body that is not JSON', () => {
    expect(() => normalize(OPERATIONS.getBill, '<html>Service Unavailable</html>')).toThrow(DecodeError);
  });
});

describe('code translation per operation', () => {
  it('labels the remaining bill children', () => {
    const body = JSON.stringify({
      status: 'OK',
      bill: {
        bill_id: 101,
        bill_number: 'HB1',
        history: [{ date: '2025-01-10', action: 'Filed', chamber: 'H' }],
        sasts: [{ type_id: 1, sast_bill_number: 'SB1' }],
        amendments: [{ amendment_id: 30, chamber: 'S', mime_id: 1 }],
        supplements: [{ supplement_id: 40, type_id: 2, mime_id: 2 }]
      }
    });

    const bill = normalize(OPERATIONS.getBill, body);

    expect(bill.history).toEqual([{ date: '2025-01-10', action: 'Filed', chamber: 'H', chamber_desc: 'House' }]);
    expect(bill.sasts).toEqual([{ type_id: 1, type_desc: 'Same As', sast_bill_number: 'SB1' }]);
    expect(bill.amendments).toEqual([
      { amendment_id: 30, chamber: 'S', chamber_desc: 'Senate', mime_id: 1, mime_desc: 'HTML' }
    ]);
    expect(bill.supplements).toEqual([
      { supplement_id: 40, type_id: 2, type_desc: 'Analysis', mime_id: 2, mime_desc: 'PDF' }
    ]);
  });

  it('labels an amendment', () => {
    const body = JSON.stringify({ status: 'OK', amendment: { amendment_id: 30, chamber: 'A', mime_id: 2 } });

    expect(normalize(OPERATIONS.getAmendment, body)).toEqual({
      amendment_id: 30,
      chamber: 'A',
      chamber_desc: 'Assembly',
      mime_id: 2,
      mime_desc: 'PDF'
    });
  });

  it('labels a supplement type from the supplement table, not the text table', () => {
    const body = JSON.stringify({ status: 'OK', supplement: { supplement_id: 40, type_id: 1, mime_id: 1 } });

    const supplement = normalize(OPERATIONS.getSupplement, body);

    expect(supplement.type_desc).toBe('Fiscal Note');
    expect(supplement.mime_desc).toBe('HTML');
  });

  it('labels the people of a session', () => {
    const body = JSON.stringify({
      status: 'OK',
      sessionpeople: {
        session: { session_id: 2011 },
        people: [
          { people_id: 7, name: 'Test Person', party_id: 2, role_id: 2 },
          { people_id: 8, name: 'Other Person', party_id: 3, role_id: 1 }
        ]
      }
    });

    const { people } = normalize(OPERATIONS.getSessionPeople, body);

    expect(people.map(person => [person.party_desc, person.role_desc])).toEqual([
      ['Republican', 'Senator / Upper Chamber'],
      ['Independent', 'Representative / Lower Chamber']
    ]);
  });

  it('labels the sponsor of a sponsored list', () => {
    const body = JSON.stringify({
      status: 'OK',
      sponsoredbills: {
        sponsor: { people_id: 7, name: 'Test Person', party_id: 1, role_id: 1 },
        sessions: [{ session_id: 2011 }],
        bills: [{ bill_id: 101, number: 'HB1', session_id: 2011 }]
      }
    });

    const { sponsor, bills } = normalize(OPERATIONS.getSponsoredList, body);

    expect(sponsor).toEqual({
      people_id: 7,
      name: 'Test Person',
      party_id: 1,
      party_desc: 'Democrat',
      role_id: 1,
      role_desc: 'Representative / Lower Chamber'
    });
    expect(bills).toEqual([{ bill_id: 101, number: 'HB1', session_id: 2011 }]);
  });
});

describe('translateCodes', () => {
  it('leaves the input untouched', () => {
    const rollCall = { roll_call_id: 5, chamber: 'S', votes: [{ people_id: 7, vote_id: 2 }] };

    const translated = translateCodes(rollCall, OPERATIONS.getRollCall.translations ?? {});

    expect(translated).toEqual({
      roll_call_id: 5,
      chamber: 'S',
      chamber_desc: 'Senate',
      votes: [{ people_id: 7, vote_id: 2, vote_desc: 'Nay' }]
    });
    expect(rollCall).toEqual({ roll_call_id: 5, chamber: 'S', votes: [{ people_id: 7, vote_id: 2 }] });
  });

  it('ignores code fields that are missing or null', () => {
    const translated = translateCodes(
      { people_id: 7, name: 'Test Person', party_id: null },
      OPERATIONS.getPerson.translations ?? {}
    );

    expect(translated).toEqual({ people_id: 7, name: 'Test Person', party_id: null });
  });
});
