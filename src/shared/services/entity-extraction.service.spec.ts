import { EntityExtractionService } from './entity-extraction.service'

describe('EntityExtractionService', () => {
  const extraction = new EntityExtractionService()

  describe('contact details', () => {
    const text = 'Contact: jean.dupont@example.com / 06 12 34 56 78'

    it('extracts the first email address', () => {
      expect(extraction.extractEmail(text)).toBe('jean.dupont@example.com')
    })

    it('extracts the first phone number', () => {
      expect(extraction.extractPhone(text)).toBe('06 12 34 56 78')
    })

    it('returns empty strings on a miss', () => {
      expect(extraction.extractEmail('no contact')).toBe('')
      expect(extraction.extractPhone('no contact')).toBe('')
    })
  })

  describe('extractYearsOfExperience', () => {
    it('uses the first pattern that matches', () => {
      expect(extraction.extractYearsOfExperience("3 ans d'expérience, 10 years")).toBe(3)
    })

    it('reads the english form', () => {
      expect(extraction.extractYearsOfExperience('5 years of experience in analytics')).toBe(5)
    })

    it('reads the "expérience: N" form', () => {
      expect(extraction.extractYearsOfExperience('Expérience : 4')).toBe(4)
    })

    it('reads "années"', () => {
      expect(extraction.extractYearsOfExperience("Data analyst, 5 années d'expérience en BI")).toBe(5)
    })

    it('ignores a year followed by a word starting with "an"', () => {
      expect(extraction.extractYearsOfExperience('2021 Analyst chez Acme')).toBe(0)
    })

    it('defaults to 0', () => {
      expect(extraction.extractYearsOfExperience('Data analyst junior')).toBe(0)
    })
  })

  describe('extractEducationLevel', () => {
    it('returns the highest tier mentioned first in priority order', () => {
      expect(extraction.extractEducationLevel('Licence Informatique, Master 2 Data Science')).toBe('master')
      expect(extraction.extractEducationLevel('PhD in physics')).toBe('doctorat')
    })

    it('matches whole words only', () => {
      expect(extraction.extractEducationLevel('Baccalauréat S')).toBe('bac')
    })

    it('defaults to unknown', () => {
      expect(extraction.extractEducationLevel('Autodidacte')).toBe('unknown')
    })
  })

  it('parses skills on every delimiter, drops short tokens and duplicates', () => {
    expect(extraction.parseSkills('Python, SQL; Power BI\n• Docker - python\nR')).toEqual([
      'Python',
      'SQL',
      'Power BI',
      'Docker',
    ])
  })

  it('extracts diplomas line by line', () => {
    const education = "Master Data Science - Université X\nBTS SIO\nBac\nDiplôme d'ingénieur"

    expect(extraction.extractDiplomas(education)).toEqual([
      { type: 'master', description: 'Master Data Science - Université X' },
      { type: 'bts', description: 'BTS SIO' },
      { type: 'ingénieur', description: "Diplôme d'ingénieur" },
    ])
  })

  it('groups experience lines under the year that opens them', () => {
    const experience = 'Parcours\n2021 - 2023 Data Analyst chez Acme\nTableaux de bord Power BI\n\n2019 Stage BI'

    expect(extraction.extractExperiences(experience)).toEqual([
      { year: '2021', description: '2021 - 2023 Data Analyst chez Acme Tableaux de bord Power BI' },
      { year: '2019', description: '2019 Stage BI' },
    ])
  })

  describe('extractName', () => {
    it('takes the first line that looks like a name', () => {
      expect(extraction.extractName('\nJean Dupont\njean@example.com')).toBe('Jean Dupont')
    })

    it('skips short lines, emails and phone numbers', () => {
      expect(extraction.extractName('CV\njean@example.com\n0612345678\nMarie Curie')).toBe('Marie Curie')
    })
  })

  it('detects canonical languages in reporting order', () => {
    expect(extraction.detectLanguages("French native, anglais courant, notions d'Espagnol")).toEqual([
      'anglais',
      'francais',
      'espagnol',
    ])
  })
})
