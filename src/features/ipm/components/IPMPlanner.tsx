// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import React, { useState } from 'react';
import { useShallow } from 'zustand/react/shallow';
import {
  AlertCircle,
  Beaker,
  Bug,
  Calendar,
  FileText,
  Flower2,
  Leaf,
  Lightbulb,
  Loader2,
  Shield,
  Sun,
  TrendingUp,
} from 'lucide-react';
import { apiService } from '../../../api/backend';
import { COMMON_DISEASES, CROPS } from '../../../core/config/app';
import type { TranslationFunction } from '../../../core/i18n';
import type { IpmStrategy, OutbreakPrediction } from '../../../core/types';
import { useAgriStore } from '../../../store';
import { useLanguage } from '../../session/hooks/useLanguage';
import { resolveWeatherLocation } from '../../weather';
import { useRequest } from '../../../shared/hooks/useRequest';
import { getLevelClasses, humanize } from '../../../shared/utils/common';
import { buildStrategyRequest, CUSTOM_DISEASE, resolveDiseaseName } from '../utils/strategyRequest';
import CollapsibleSection from './CollapsibleSection';

type SectionId = 'immediate' | 'weekly' | 'organic' | 'chemical' | 'companion' | 'biological' | 'spray' | 'prevention';

const DEFAULT_EXPANDED: SectionId[] = ['immediate', 'organic'];

const StrategyView: React.FC<{ strategy: IpmStrategy; t: TranslationFunction }> = ({ strategy, t }) => {
  const [expanded, setExpanded] = useState<SectionId[]>(DEFAULT_EXPANDED);

  const sectionProps = (id: SectionId) => ({
    expanded: expanded.includes(id),
    onToggle: () => setExpanded(prev => (prev.includes(id) ? prev.filter(s => s !== id) : [...prev, id])),
  });

  const risk = strategy.risk_assessment;

  return (
    <div className="space-y-4">
      <div className="bg-white rounded-2xl border border-gray-200 p-6 shadow-sm">
        <h2 className="text-xl font-bold text-gray-800 mb-4">{strategy.strategy_name || t('strategyDefaultName')}</h2>
        {risk && (
          <div className="grid grid-cols-3 gap-4">
            <div className="text-center p-3 bg-gray-50 rounded-xl">
              <p className="text-xs text-gray-500 mb-1">{t('currentSeverity')}</p>
              <span className={`px-2 py-1 rounded text-sm font-medium ${getLevelClasses(risk.current_severity)}`}>
                {risk.current_severity}
              </span>
            </div>
            <div className="text-center p-3 bg-gray-50 rounded-xl">
              <p className="text-xs text-gray-500 mb-1">{t('spreadRisk')}</p>
              <span className={`px-2 py-1 rounded text-sm font-medium ${getLevelClasses(risk.spread_risk)}`}>
                {risk.spread_risk}
              </span>
            </div>
            <div className="text-center p-3 bg-gray-50 rounded-xl">
              <p className="text-xs text-gray-500 mb-1">{t('yieldImpact')}</p>
              <span className="text-sm font-medium text-gray-700">{risk.yield_impact_if_untreated}</span>
            </div>
          </div>
        )}
        {strategy.raw_strategy && (
          <pre className="mt-4 whitespace-pre-wrap text-sm text-gray-600 bg-gray-50 p-4 rounded-lg">{strategy.raw_strategy}</pre>
        )}
      </div>

      {strategy.immediate_actions && strategy.immediate_actions.length > 0 && (
        <CollapsibleSection title={t('immediateActions')} icon={<Bug className="w-5 h-5 text-red-500" />} {...sectionProps('immediate')}>
          <div className="space-y-3">
            {strategy.immediate_actions.map((action, idx) => (
              <div key={idx} className="flex items-start gap-3 p-3 bg-red-50 rounded-lg">
                {action.priority && (
                  <span className={`px-2 py-0.5 rounded text-xs font-medium ${getLevelClasses(action.priority)}`}>
                    {action.priority.toUpperCase()}
                  </span>
                )}
                <div>
                  <p className="font-medium text-gray-800">{action.action}</p>
                  {action.timing && <p className="text-sm text-gray-600">{action.timing}</p>}
                </div>
              </div>
            ))}
          </div>
        </CollapsibleSection>
      )}

      {strategy.weekly_plan && strategy.weekly_plan.length > 0 && (
        <CollapsibleSection title={t('weeklyPlan')} icon={<Calendar className="w-5 h-5 text-blue-500" />} {...sectionProps('weekly')}>
          <div className="space-y-4">
            {strategy.weekly_plan.map(week => (
              <div key={week.week} className="border-l-4 border-blue-400 pl-4">
                <h4 className="font-semibold text-gray-800">{t('week')} {week.week}</h4>
                <ul className="list-disc list-inside text-gray-600 text-sm mt-1">
                  {(week.actions ?? []).map((action, i) => (
                    <li key={i}>{action}</li>
                  ))}
                </ul>
                {week.monitoring && (
                  <p className="text-xs text-gray-500 mt-1">{t('monitor')}: {week.monitoring}</p>
                )}
              </div>
            ))}
          </div>
        </CollapsibleSection>
      )}

      {strategy.organic_solutions && strategy.organic_solutions.length > 0 && (
        <CollapsibleSection title={t('organicSolutions')} icon={<Leaf className="w-5 h-5 text-green-500" />} {...sectionProps('organic')}>
          <div className="space-y-3">
            {strategy.organic_solutions.map((solution, idx) => (
              <div key={idx} className="p-3 bg-green-50 rounded-lg">
                <p className="font-medium text-green-800">{solution.product}</p>
                <p className="text-sm text-green-700">{solution.application}</p>
                <div className="flex gap-4 mt-2 text-xs text-green-600">
                  <span>{t('frequency')}: {solution.frequency}</span>
                  <span>{t('effectiveness')}: {solution.effectiveness}</span>
                </div>
              </div>
            ))}
          </div>
        </CollapsibleSection>
      )}

      {strategy.chemical_solutions && strategy.chemical_solutions.length > 0 && (
        <CollapsibleSection title={t('chemicalSolutions')} icon={<Beaker className="w-5 h-5 text-blue-500" />} {...sectionProps('chemical')}>
          <div className="space-y-3">
            {strategy.chemical_solutions.map((solution, idx) => (
              <div key={idx} className="p-3 bg-blue-50 rounded-lg">
                <p className="font-medium text-blue-800">{solution.product}</p>
                <p className="text-sm text-blue-700">{t('dosage')}: {solution.dosage}</p>
                <p className="text-sm text-blue-600">{t('safetyPeriod', { period: solution.safety_period })}</p>
                {solution.safety_precautions && solution.safety_precautions.length > 0 && (
                  <div className="mt-2">
                    <p className="text-xs font-medium text-blue-700">{t('safety')}:</p>
                    <ul className="list-disc list-inside text-xs text-blue-600">
                      {solution.safety_precautions.map((precaution, i) => (
                        <li key={i}>{precaution}</li>
                      ))}
                    </ul>
                  </div>
                )}
              </div>
            ))}
          </div>
        </CollapsibleSection>
      )}

      {strategy.companion_planting && strategy.companion_planting.length > 0 && (
        <CollapsibleSection title={t('companionPlanting')} icon={<Flower2 className="w-5 h-5 text-purple-500" />} {...sectionProps('companion')}>
          <div className="grid md:grid-cols-2 gap-3">
            {strategy.companion_planting.map((plant, idx) => (
              <div key={idx} className="p-3 bg-purple-50 rounded-lg">
                <p className="font-medium text-purple-800">{plant.plant}</p>
                <p className="text-sm text-purple-700">{plant.benefit}</p>
                <p className="text-xs text-purple-600 mt-1">{plant.placement}</p>
              </div>
            ))}
          </div>
        </CollapsibleSection>
      )}

      {strategy.biological_controls && strategy.biological_controls.length > 0 && (
        <CollapsibleSection title={t('biologicalControls')} icon={<Bug className="w-5 h-5 text-amber-500" />} {...sectionProps('biological')}>
          <div className="space-y-3">
            {strategy.biological_controls.map((control, idx) => (
              <div key={idx} className="p-3 bg-amber-50 rounded-lg">
                <p className="font-medium text-amber-800">{control.organism}</p>
                <p className="text-sm text-amber-700">{control.target_pest}</p>
                <p className="text-xs text-amber-600 mt-1">{control.application}</p>
              </div>
            ))}
          </div>
        </CollapsibleSection>
      )}

      {strategy.optimal_spray_windows && strategy.optimal_spray_windows.length > 0 && (
        <CollapsibleSection title={t('sprayWindows')} icon={<Sun className="w-5 h-5 text-yellow-500" />} {...sectionProps('spray')}>
          <div className="flex flex-wrap gap-2">
            {strategy.optimal_spray_windows.map(window => (
              <div key={window.date} className={`px-3 py-2 rounded-lg ${getLevelClasses(window.quality)}`}>
                <span className="font-medium">{window.date}</span>
                <span className="text-xs ml-2">({humanize(window.quality)})</span>
              </div>
            ))}
          </div>
        </CollapsibleSection>
      )}

      {strategy.prevention_for_next_season && strategy.prevention_for_next_season.length > 0 && (
        <CollapsibleSection title={t('preventionNextSeason')} icon={<Shield className="w-5 h-5 text-teal-500" />} {...sectionProps('prevention')}>
          <ul className="space-y-2">
            {strategy.prevention_for_next_season.map((tip, idx) => (
              <li key={idx} className="flex items-start gap-2 text-teal-700">
                <Shield className="w-4 h-4 mt-0.5 flex-shrink-0" />
                {tip}
              </li>
            ))}
          </ul>
        </CollapsibleSection>
      )}
    </div>
  );
};

const OutbreakView: React.FC<{ prediction: OutbreakPrediction; t: TranslationFunction }> = ({ prediction, t }) => (
  <div className="bg-white rounded-2xl border border-gray-200 p-6 shadow-sm space-y-4">
    <div className="flex items-center justify-between">
      <h2 className="text-lg font-semibold text-gray-800">{t('outbreakPrediction')}</h2>
      <span className="text-sm text-gray-600">
        {t('outlook')}: <span className="font-medium">{humanize(prediction.overall_outlook)}</span>
      </span>
    </div>
    <div className="grid grid-cols-2 sm:grid-cols-4 md:grid-cols-7 gap-2">
      {prediction.daily_risks.map(day => (
        <div key={day.date} className={`p-2 rounded-lg text-center ${getLevelClasses(day.risk_level)}`} title={day.factors.join(', ')}>
          <p className="text-xs">{day.date}</p>
          <p className="font-semibold">{day.risk_score}</p>
          {day.diseases_at_risk.length > 0 && (
            <p className="text-[10px] mt-1 truncate">{day.diseases_at_risk.join(', ')}</p>
          )}
        </div>
      ))}
    </div>
    {prediction.recommendations.length > 0 && (
      <ul className="list-disc list-inside text-sm text-gray-700 space-y-1">
        {prediction.recommendations.map((rec, idx) => (
          <li key={idx}>{rec}</li>
        ))}
      </ul>
    )}
  </div>
);

const IPMPlanner: React.FC = () => {
  const { t } = useLanguage();
  const { location, locationStatus } = useAgriStore(
    useShallow(state => ({ location: state.location, locationStatus: state.locationStatus }))
  );
  const [disease, setDisease] = useState('');
  const [customDisease, setCustomDisease] = useState('');
  const [crop, setCrop] = useState<string>(CROPS[0]);
  const [validationError, setValidationError] = useState(false);

  const strategy = useRequest(apiService.generateIPMStrategy, 'IPM strategy');
  const quick = useRequest(apiService.getQuickRecommendation, 'Quick recommendation');
  const outbreak = useRequest(apiService.predictOutbreak, 'Outbreak prediction');

  const outbreakLocation = resolveWeatherLocation(location, locationStatus);

  const generate = () => {
    const request = buildStrategyRequest(disease, customDisease, crop, location);
    setValidationError(request === null);
    if (request) strategy.run(request);
  };

  const askQuick = () => {
    const name = resolveDiseaseName(disease, customDisease);
    setValidationError(!name);
    if (name) quick.run(name, crop);
  };

  const predict = () => {
    if (!outbreakLocation) return;
    outbreak.run(outbreakLocation.location.latitude, outbreakLocation.location.longitude, crop);
  };

  const isGenerating = strategy.state.status === 'pending';

  return (
    <div className="p-6 h-full overflow-y-auto">
      <div className="max-w-3xl mx-auto space-y-6">
        <div className="text-center">
          <h1 className="text-2xl font-bold text-gray-800 flex items-center justify-center gap-2">
            <Shield className="w-7 h-7 text-green-600" />
            {t('ipmPlanner')}
          </h1>
          <p className="text-gray-600 mt-2">{t('ipmDesc')}</p>
        </div>

        <div className="bg-white rounded-2xl border border-gray-200 p-6 shadow-sm space-y-4">
          <div className="grid md:grid-cols-2 gap-4">
            <div>
              <label htmlFor="ipm-crop" className="block text-sm font-medium text-gray-700 mb-2">
                {t('cropType')}
              </label>
              <select
                id="ipm-crop"
                value={crop}
                onChange={e => setCrop(e.target.value)}
                className="w-full px-4 py-2.5 border border-gray-200 rounded-xl focus:ring-2 focus:ring-green-500"
              >
                {CROPS.map(c => (
                  <option key={c} value={c}>{humanize(c)}</option>
                ))}
              </select>
            </div>

            <div>
              <label htmlFor="ipm-disease" className="block text-sm font-medium text-gray-700 mb-2">
                {t('selectDisease')}
              </label>
              <select
                id="ipm-disease"
                value={disease}
                onChange={e => setDisease(e.target.value)}
                className="w-full px-4 py-2.5 border border-gray-200 rounded-xl focus:ring-2 focus:ring-green-500"
              >
                <option value="">{t('selectDisease')}</option>
                {COMMON_DISEASES.map(d => (
                  <option key={d.value} value={d.value}>{d.label}</option>
                ))}
                <option value={CUSTOM_DISEASE}>{t('customDisease')}</option>
              </select>
            </div>
          </div>

          {disease === CUSTOM_DISEASE && (
            <div>
              <label htmlFor="ipm-custom" className="block text-sm font-medium text-gray-700 mb-2">
                {t('enterDisease')}
              </label>
              <input
                id="ipm-custom"
                type="text"
                value={customDisease}
                onChange={e => setCustomDisease(e.target.value)}
                placeholder={t('customDiseasePlaceholder')}
                className="w-full px-4 py-2.5 border border-gray-200 rounded-xl focus:ring-2 focus:ring-green-500"
              />
            </div>
          )}

          {validationError && <p className="text-sm text-red-600">{t('selectDiseaseFirst')}</p>}

          <button
            onClick={generate}
            disabled={isGenerating}
            className="w-full py-3 bg-green-600 text-white rounded-xl hover:bg-green-700 disabled:opacity-50 transition-colors flex items-center justify-center gap-2"
          >
            {isGenerating ? <Loader2 className="w-5 h-5 animate-spin" /> : <FileText className="w-5 h-5" />}
            {isGenerating ? t('generating') : t('generateStrategy')}
          </button>

          <div className="grid grid-cols-2 gap-3">
            <button
              onClick={askQuick}
              disabled={quick.state.status === 'pending'}
              className="py-2.5 border border-gray-200 rounded-xl hover:bg-gray-50 disabled:opacity-50 flex items-center justify-center gap-2 text-gray-700"
            >
              {quick.state.status === 'pending' ? <Loader2 className="w-4 h-4 animate-spin" /> : <Lightbulb className="w-4 h-4" />}
              {t('quickRecommendation')}
            </button>
            <button
              onClick={predict}
              disabled={!outbreakLocation || outbreak.state.status === 'pending'}
              className="py-2.5 border border-gray-200 rounded-xl hover:bg-gray-50 disabled:opacity-50 flex items-center justify-center gap-2 text-gray-700"
            >
              {outbreak.state.status === 'pending' ? <Loader2 className="w-4 h-4 animate-spin" /> : <TrendingUp className="w-4 h-4" />}
              {t('predictOutbreak')}
            </button>
          </div>
        </div>

        {strategy.state.status === 'error' && (
          <div className="p-4 bg-red-50 border border-red-200 rounded-xl text-red-700 flex items-center gap-2">
            <AlertCircle className="w-5 h-5" />
            {t('failedStrategy')}
          </div>
        )}

        {quick.state.status === 'success' && (
          <div className="p-4 bg-yellow-50 border border-yellow-200 rounded-xl">
            <h3 className="font-semibold text-yellow-800 flex items-center gap-2 mb-2">
              <Lightbulb className="w-5 h-5" />
              {t('quickRecommendation')}
            </h3>
            <p className="text-yellow-900 whitespace-pre-wrap">{quick.state.data.recommendation}</p>
          </div>
        )}
        {(quick.state.status === 'error' || outbreak.state.status === 'error') && (
          <p className="text-sm text-red-600">{t('connectionError')}</p>
        )}

        {outbreak.state.status === 'success' && <OutbreakView prediction={outbreak.state.data} t={t} />}

        {strategy.state.status === 'success' && <StrategyView strategy={strategy.state.data} t={t} />}
      </div>
    </div>
  );
};

export default IPMPlanner;
