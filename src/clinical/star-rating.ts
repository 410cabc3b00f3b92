export type StarRating = '0' | '1' | '2' | '3' | '4' | 'N/A';

export const STAR_RATINGS: readonly StarRating[] = ['0', '1', '2', '3', '4', 'N/A'];

/**
 * ClinVar review status text to its star tier. Rules are checked in order and
 * the first match wins; "multiple submitters, no conflicts" must be tested
 * before plain "multiple submitters".
 */
export function reviewStatusToStars(reviewStatus: string | null | undefined): StarRating {
    if (!reviewStatus) {
        return '0';
    }

    const status = reviewStatus.toLowerCase();

    if (status.includes('expert panel')) {
        return '4';
    }
    if (status.includes('multiple submitters') && status.includes('no conflict')) {
        return '3';
    }
    if (status.includes('multiple submitters')) {
        return '2';
    }
    if (status.includes('single submitter')) {
        return '1';
    }
    if (status.includes('no assertion') || status.includes('no criteria')) {
        return '0';
    }
    return 'N/A';
}
