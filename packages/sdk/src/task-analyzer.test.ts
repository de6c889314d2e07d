/**
 * Tests for task analysis validation and the keyword analyzer
 */

import { describe, it, expect } from 'vitest';
import { KeywordTaskAnalyzer, validateTaskAnalysis } from './task-analyzer';
import { ValidationError } from './errors';

describe('Task Analysis', () => {
  describe('validateTaskAnalysis', () => {
    const valid = {
      task_type: 'research',
      domain: ' Finance ',
      complexity: 'moderate',
      required_capabilities: ['trading'],
      keywords: ['stocks'],
      confidence: 0.8,
    };

    it('should normalize the domain', () => {
      expect(validateTaskAnalysis(valid).domain).toBe('finance');
      expect(validateTaskAnalysis({ ...valid, domain: '' }).domain).toBe('general');
    });

    it('should reject an unknown complexity', () => {
      expect(() => validateTaskAnalysis({ ...valid, complexity: 'extreme' })).toThrow(ValidationError);
    });

    it('should reject confidence outside [0, 1]', () => {
      expect(() => validateTaskAnalysis({ ...valid, confidence: 1.5 })).toThrow(
        'confidence must be a number between 0 and 1'
      );
    });

    it('should reject non-string capability lists', () => {
      expect(() => validateTaskAnalysis({ ...valid, required_capabilities: [1, 2] })).toThrow(
        'required_capabilities must be an array of strings'
      );
    });

    it('should reject non-objects', () => {
      expect(() => validateTaskAnalysis('analyze stocks')).toThrow('Task analysis must be an object');
    });
  });

  describe('KeywordTaskAnalyzer', () => {
    const analyzer = new KeywordTaskAnalyzer();

    it('should detect domain, capabilities, type and keywords', () => {
      const analysis = analyzer.analyzeTask('Analyze quarterly stock portfolio trends and build a dashboard chart');

      expect(analysis).toEqual({
        task_type: 'data_analysis',
        domain: 'finance',
        complexity: 'moderate',
        required_capabilities: ['data_analysis', 'visualization'],
        keywords: ['analyze', 'quarterly', 'stock', 'portfolio', 'trends', 'build', 'dashboard', 'chart'],
        confidence: 1,
      });
    });

    it('should honour an explicit domain and capability list', () => {
      const analysis = analyzer.analyzeTask(
        'Task requiring finance domain expertise with capabilities: trading, risk-analysis'
      );

      expect(analysis.domain).toBe('finance');
      expect(analysis.required_capabilities).toEqual(['trading', 'risk-analysis']);
      expect(analysis.task_type).toBe('general');
      expect(analysis.keywords).toEqual(['finance', 'trading', 'risk-analysis']);
      expect(analysis.confidence).toBe(0.9);
    });

    it('should rank repeated words first', () => {
      const analysis = analyzer.analyzeTask('translate the report, then translate the summary');

      expect(analysis.keywords).toEqual(['translate', 'report', 'then', 'summary']);
    });

    it('should fall back to a general, simple analysis for empty input', () => {
      expect(analyzer.analyzeTask('')).toEqual({
        task_type: 'general',
        domain: 'general',
        complexity: 'simple',
        required_capabilities: [],
        keywords: [],
        confidence: 0.5,
      });
    });

    it('should flag multi-part work as complex', () => {
      expect(analyzer.analyzeTask('Integrate multiple data sources').complexity).toBe('complex');
    });
  });
});
