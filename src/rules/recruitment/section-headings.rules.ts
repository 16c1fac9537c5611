/**
 * SECTION HEADINGS
 * APPLICABLE TO: RÉSUMÉS AND JOB POSTINGS (FR / EN)
 *
 * Section name → heading synonyms. A line is a heading when, after stripping
 * bullets, colons and dashes, it starts with one of these synonyms as a whole word.
 * Synonyms are matched case-insensitively.
 */

export type SectionHeadings = Readonly<Record<string, readonly string[]>>

export const CANDIDATE_SECTION_NAMES = ['skills', 'experience', 'education', 'languages'] as const

export type CandidateSectionName = (typeof CANDIDATE_SECTION_NAMES)[number]

export const CANDIDATE_SECTION_HEADINGS = {
  skills: ['compétences techniques', 'technical skills', 'compétences', 'compétence', 'skills', 'skill'],
  experience: [
    'expérience professionnelle',
    'work experience',
    'expériences',
    'expérience',
    'experiences',
    'experience',
  ],
  education: ['formation', 'éducation', 'education', 'studies'],
  languages: ['langues', 'langue', 'languages', 'language'],
} as const satisfies Record<CandidateSectionName, readonly string[]>

export const JOB_SECTION_HEADINGS = {
  responsibilities: [
    'responsibilities',
    'missions',
    'responsabilites',
    'responsabilités',
    'votre rôle',
    'votre role',
    'vos missions',
  ],
  requirements: ['requirements', 'profil', 'requis', 'qualifications', 'prerequis', 'prérequis'],
  skills: [
    'skills',
    'competences',
    'compétences',
    'competences techniques',
    'hard skills',
    'technical skills',
    'compétences requises',
    'compétences clés',
  ],
  soft_skills: ['soft skills', 'qualites', 'qualités humaines', 'savoir être', 'savoir-être'],
  benefits: ['benefits', 'avantages', 'perks'],
  company: ['about us', 'a propos', 'à propos', 'a propos de nous', 'company'],
} as const satisfies SectionHeadings

// Leading/trailing characters ignored when testing a line for a heading
export const HEADING_TRIM_PATTERN = /^[\s:\-•*#\t]+|[\s:\-•*#\t]+$/g
