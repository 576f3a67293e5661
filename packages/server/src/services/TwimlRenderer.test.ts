import { describe, expect, it } from 'vitest';
import { TwimlRenderer } from './TwimlRenderer.js';

const renderer = new TwimlRenderer({ gatherTimeoutSeconds: 6 });

describe('TwimlRenderer', () => {
    it('wraps a keypad prompt in a single-digit gather that reports empty results', () => {
        const xml = renderer.render({ prompt: 'Press 1 to confirm.', inputMode: 'digits', onTimeout: null });

        expect(xml).toContain('<Say>Press 1 to confirm.</Say></Gather>');
        expect(xml).toContain('numDigits="1"');
        expect(xml).toContain('timeout="6"');
        expect(xml).toContain('actionOnEmptyResult="true"');
        expect(xml).toContain('action="/voice/answer?gather=1"');
        expect(xml).not.toContain('<Hangup/>');
    });

    it('listens for speech on inquiry turns', () => {
        const xml = renderer.render({ prompt: 'How can I help?', inputMode: 'speech', onTimeout: null });

        expect(xml).toContain('speechTimeout="auto"');
        expect(xml).toContain('<Say>How can I help?</Say></Gather>');
        expect(xml).not.toContain('numDigits');
    });

    it('says the closing and hangs up on terminal turns', () => {
        const xml = renderer.render({ prompt: 'Goodbye!', inputMode: 'none', onTimeout: null });

        expect(xml).toContain('<Response><Say>Goodbye!</Say><Hangup/></Response>');
    });

    it('dials the transfer number before hanging up', () => {
        const xml = renderer.render({ prompt: 'Please hold.', inputMode: 'none', onTimeout: null, transferTo: '+15005550100' });

        expect(xml).toContain('<Response><Say>Please hold.</Say><Dial>+15005550100</Dial><Hangup/></Response>');
    });

    it('hangs up without speaking when the prompt is empty', () => {
        expect(renderer.render({ prompt: '', inputMode: 'none', onTimeout: null })).toContain('<Response><Hangup/></Response>');
    });

    it('renders an error message', () => {
        expect(renderer.renderError('Sorry, please try again later.'))
            .toContain('<Response><Say>Sorry, please try again later.</Say><Hangup/></Response>');
    });
});
