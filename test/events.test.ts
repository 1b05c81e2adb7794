/**
 * Tests for moving the final show to the past events page
 */

import * as cheerio from 'cheerio';
import { describe, expect, it } from 'vitest';
import { migrateFinalEvent } from '../src/edits/events.js';
import { FINAL_EVENT } from '../src/edits/site-edits.js';

const SHOW =
  '<b>Wednesday, November 11th</b><br>LAST SHOW AT 1731 MARYAND AVE<br>Eze Jackson';

const current = () =>
  cheerio.load(
    '<div class="text"><p><b>Saturday, October 3rd</b><br>Band A</p>' + `<p>${SHOW}</p></div>`,
  );

describe('migrateFinalEvent', () => {
  it('files the show before the notice with the next number', () => {
    const events = current();
    const past = cheerio.load(
      '<div class="text"><p>41. <b>June 1st</b><br>Band X</p><p>42. <b>July 4th</b><br>Band Y</p>' +
        '<p>NOTICE: DUE TO UNFORSEEN CIRCUMSTANCES</p></div>',
    );

    expect(migrateFinalEvent(events, past, FINAL_EVENT)).toEqual({ status: 'moved', number: 43 });
    expect(events('p')).toHaveLength(1);
    expect(events('.text').text()).not.toContain(FINAL_EVENT.marker);
    expect(past('p').eq(2).html()).toBe(`43. ${SHOW}`);
    expect(past('p').eq(3).text()).toBe('NOTICE: DUE TO UNFORSEEN CIRCUMSTANCES');
  });

  it('files the show after the last numbered show without a notice', () => {
    const events = current();
    const past = cheerio.load(
      '<div class="text"><p>7. <b>May 2nd</b><br>Band</p></div><p>Footer</p>',
    );

    migrateFinalEvent(events, past, FINAL_EVENT);
    expect(past('.text p').last().html()).toBe(`8. ${SHOW}`);
    expect(past('p').last().text()).toBe('Footer');
  });

  it('appends to the listing when it has no numbered shows', () => {
    const past = cheerio.load('<div class="text"></div>');
    expect(migrateFinalEvent(current(), past, FINAL_EVENT)).toEqual({ status: 'moved', number: 1 });
    expect(past('.text').html()).toBe(`<p>1. ${SHOW}</p>`);
  });

  it('only removes the show when it is already filed', () => {
    const events = current();
    const past = cheerio.load(`<div class="text"><p>43. ${SHOW}</p></div>`);
    const before = past.html();

    expect(migrateFinalEvent(events, past, FINAL_EVENT)).toEqual({ status: 'already-past' });
    expect(events('p')).toHaveLength(1);
    expect(past.html()).toBe(before);
  });

  it('changes nothing when the show is not listed', () => {
    const events = cheerio.load('<p>Band A</p>');
    const past = cheerio.load('<div class="text"><p>1. Band</p></div>');
    const before = past.html();

    expect(migrateFinalEvent(events, past, FINAL_EVENT)).toEqual({ status: 'not-found' });
    expect(past.html()).toBe(before);
  });

  it('keeps the show when the past page has nowhere to put it', () => {
    const events = current();
    const past = cheerio.load('<div class="archive"></div>');

    expect(migrateFinalEvent(events, past, FINAL_EVENT)).toEqual({ status: 'no-anchor' });
    expect(events('.text').text()).toContain(FINAL_EVENT.marker);
  });
});
