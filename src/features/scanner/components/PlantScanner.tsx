// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import React, { useCallback, useState } from 'react';
import { useDropzone } from 'react-dropzone';
import {
  AlertCircle,
  Beaker,
  Camera,
  CheckCircle,
  ChevronDown,
  ChevronUp,
  Flower2,
  Leaf,
  Loader2,
  Send,
  Upload,
} from 'lucide-react';
import { apiService } from '../../../api/backend';
import { CROPS } from '../../../core/config/app';
import type { ChemicalTreatment, LeafAnalysis } from '../../../core/types';
import type { TranslationFunction } from '../../../core/i18n';
import { useLanguage } from '../../session/hooks/useLanguage';
import { useRequest } from '../../../shared/hooks/useRequest';
import { formatConfidence, getLevelClasses, humanize } from '../../../shared/utils/common';
import { readFileAsDataUrl } from '../../../utils/mediaUtils';

const describeChemical = (info: string | ChemicalTreatment): string => {
  if (typeof info === 'string') return info;
  return [info.dosage, info.safety].filter(Boolean).join(' - ');
};

const AnalysisResult: React.FC<{ result: LeafAnalysis; t: TranslationFunction }> = ({ result, t }) => {
  const [showRaw, setShowRaw] = useState(false);
  const confidence = formatConfidence(result.confidence);
  const organic = Object.entries(result.treatment_organic || {});
  const chemical = Object.entries(result.treatment_chemical || {});

  return (
    <div className="space-y-4">
      <div className="bg-white rounded-2xl border border-gray-200 p-6 shadow-sm">
        <div className="flex items-start justify-between mb-4">
          <div>
            <h2 className="text-xl font-bold text-gray-800">
              {result.disease_name || (result.disease_detected ? t('diseaseDetected') : t('healthy'))}
            </h2>
            {confidence && (
              <p className="text-gray-600 text-sm mt-1">
                {t('confidence')}: {confidence}
              </p>
            )}
          </div>
          {result.urgency_level && (
            <span className={`px-3 py-1 rounded-full text-sm font-medium ${getLevelClasses(result.urgency_level)}`}>
              {result.urgency_level.toUpperCase()}
            </span>
          )}
        </div>

        {result.description && <p className="text-gray-700 mb-4">{result.description}</p>}

        {result.symptoms && result.symptoms.length > 0 && (
          <div>
            <h3 className="font-semibold text-gray-800 mb-2">{t('symptoms')}:</h3>
            <ul className="list-disc list-inside text-gray-600 space-y-1">
              {result.symptoms.map((symptom, idx) => (
                <li key={idx}>{symptom}</li>
              ))}
            </ul>
          </div>
        )}
      </div>

      <div className="grid md:grid-cols-2 gap-4">
        <div className="bg-green-50 rounded-2xl border border-green-200 p-5">
          <h3 className="font-semibold text-green-800 flex items-center gap-2 mb-3">
            <Flower2 className="w-5 h-5" />
            {t('organicTreatment')}
          </h3>
          {organic.length > 0 ? (
            <ul className="space-y-2">
              {organic.map(([product, desc]) => (
                <li key={product} className="text-green-700">
                  <span className="font-medium">{product}:</span> <span className="text-green-600">{desc}</span>
                </li>
              ))}
            </ul>
          ) : (
            <p className="text-green-600 text-sm">{t('noOrganicTreatment')}</p>
          )}
        </div>

        <div className="bg-blue-50 rounded-2xl border border-blue-200 p-5">
          <h3 className="font-semibold text-blue-800 flex items-center gap-2 mb-3">
            <Beaker className="w-5 h-5" />
            {t('chemicalTreatment')}
          </h3>
          {chemical.length > 0 ? (
            <ul className="space-y-2">
              {chemical.map(([product, info]) => (
                <li key={product} className="text-blue-700">
                  <span className="font-medium">{product}:</span>{' '}
                  <span className="text-blue-600">{describeChemical(info)}</span>
                </li>
              ))}
            </ul>
          ) : (
            <p className="text-blue-600 text-sm">{t('noChemicalTreatment')}</p>
          )}
        </div>
      </div>

      {result.prevention_tips && result.prevention_tips.length > 0 && (
        <div className="bg-purple-50 rounded-2xl border border-purple-200 p-5">
          <h3 className="font-semibold text-purple-800 flex items-center gap-2 mb-3">
            <CheckCircle className="w-5 h-5" />
            {t('prevention')}
          </h3>
          <ul className="space-y-1">
            {result.prevention_tips.map((tip, idx) => (
              <li key={idx} className="text-purple-700 flex items-start gap-2">
                <CheckCircle className="w-4 h-4 mt-0.5 flex-shrink-0" />
                {tip}
              </li>
            ))}
          </ul>
        </div>
      )}

      {result.raw_analysis && (
        <div className="bg-gray-50 rounded-xl border border-gray-200">
          <button
            onClick={() => setShowRaw(!showRaw)}
            className="w-full p-4 flex items-center justify-between text-gray-700 hover:bg-gray-100 rounded-xl transition-colors"
          >
            <span className="font-medium">{t('rawAnalysis')}</span>
            {showRaw ? <ChevronUp className="w-5 h-5" /> : <ChevronDown className="w-5 h-5" />}
          </button>
          {showRaw && (
            <div className="px-4 pb-4">
              <pre className="whitespace-pre-wrap text-sm text-gray-600 bg-white p-4 rounded-lg border overflow-x-auto">
                {result.raw_analysis}
              </pre>
            </div>
          )}
        </div>
      )}
    </div>
  );
};

const PlantScanner: React.FC = () => {
  const { t } = useLanguage();
  const [selectedFile, setSelectedFile] = useState<File | null>(null);
  const [preview, setPreview] = useState<string | null>(null);
  const [cropType, setCropType] = useState('');
  const [question, setQuestion] = useState('');

  const analysis = useRequest(
    (file: File, crop: string) => apiService.analyzeLeaf(file, file.name, crop || undefined),
    'Leaf analysis'
  );
  const diagnosis = useRequest(
    (file: File, text: string) => apiService.quickDiagnosis(file, file.name, text),
    'Quick diagnosis'
  );
  const resetAnalysis = analysis.reset;
  const resetDiagnosis = diagnosis.reset;

  const onDrop = useCallback((acceptedFiles: File[]) => {
    const file = acceptedFiles[0];
    if (!file) return;
    setSelectedFile(file);
    resetAnalysis();
    resetDiagnosis();
    readFileAsDataUrl(file)
      .then(setPreview)
      .catch(error => console.error('Failed to preview image:', error));
  }, [resetAnalysis, resetDiagnosis]);

  const { getRootProps, getInputProps, isDragActive } = useDropzone({
    onDrop,
    accept: { 'image/*': [] },
    maxFiles: 1,
  });

  const reset = () => {
    setSelectedFile(null);
    setPreview(null);
    setQuestion('');
    analysis.reset();
    diagnosis.reset();
  };

  const analyze = () => {
    if (selectedFile) analysis.run(selectedFile, cropType);
  };

  const ask = () => {
    const text = question.trim();
    if (selectedFile && text) diagnosis.run(selectedFile, text);
  };

  const isAnalyzing = analysis.state.status === 'pending';
  const result = analysis.state.status === 'success' ? analysis.state.data : null;

  return (
    <div className="p-6 h-full overflow-y-auto">
      <div className="max-w-2xl mx-auto space-y-6">
        <div className="text-center">
          <h1 className="text-2xl font-bold text-gray-800 flex items-center justify-center gap-2">
            <Leaf className="w-7 h-7 text-green-600" />
            {t('plantScanner')}
          </h1>
          <p className="text-gray-600 mt-2">{t('scannerDesc')}</p>
        </div>

        <div>
          <label htmlFor="scanner-crop" className="block text-sm font-medium text-gray-700 mb-2">
            {t('cropType')} ({t('optional')})
          </label>
          <select
            id="scanner-crop"
            value={cropType}
            onChange={e => setCropType(e.target.value)}
            className="w-full px-4 py-2 border border-gray-200 rounded-lg focus:ring-2 focus:ring-green-500"
            title={t('selectCrop')}
          >
            <option value="">{t('autoDetect')}</option>
            {CROPS.map(crop => (
              <option key={crop} value={crop}>{humanize(crop)}</option>
            ))}
          </select>
        </div>

        {!preview && (
          <div
            {...getRootProps()}
            className={`border-2 border-dashed rounded-2xl p-8 text-center cursor-pointer transition-all ${
              isDragActive ? 'border-green-500 bg-green-50' : 'border-gray-300 hover:border-green-400 hover:bg-gray-50'
            }`}
          >
            <input {...getInputProps()} />
            <div className="flex flex-col items-center gap-4">
              <div className="p-4 bg-green-100 rounded-full">
                <Upload className="w-8 h-8 text-green-600" />
              </div>
              <div>
                <p className="text-lg font-medium text-gray-700">{t('dragDrop')}</p>
                <p className="text-gray-500 mt-1">{t('supportedFormats')}</p>
              </div>
              <div className="flex gap-4 text-sm text-gray-500">
                <span className="flex items-center gap-1">
                  <Camera className="w-4 h-4" /> {t('takePhoto')}
                </span>
                <span className="flex items-center gap-1">
                  <Leaf className="w-4 h-4" /> {t('uploadImage')}
                </span>
              </div>
            </div>
          </div>
        )}

        {preview && (
          <div className="space-y-4">
            <div className="relative rounded-2xl overflow-hidden border border-gray-200">
              <img src={preview} alt="" className="w-full h-64 object-contain bg-gray-100" />
              {isAnalyzing && (
                <div className="absolute inset-0 bg-black/50 flex items-center justify-center">
                  <div className="text-white text-center">
                    <Loader2 className="w-10 h-10 animate-spin mx-auto" />
                    <p className="mt-2">{t('analyzing')}</p>
                  </div>
                </div>
              )}
            </div>

            {!result && (
              <div className="flex gap-3">
                <button
                  onClick={reset}
                  className="flex-1 px-4 py-3 border border-gray-300 rounded-xl hover:bg-gray-50 transition-colors"
                >
                  {t('resetScan')}
                </button>
                <button
                  onClick={analyze}
                  disabled={isAnalyzing}
                  className="flex-1 px-4 py-3 bg-green-600 text-white rounded-xl hover:bg-green-700 disabled:opacity-50 transition-colors flex items-center justify-center gap-2"
                >
                  {isAnalyzing ? <Loader2 className="w-5 h-5 animate-spin" /> : <Leaf className="w-5 h-5" />}
                  {isAnalyzing ? t('analyzing') : t('analyzeImage')}
                </button>
              </div>
            )}

            <div className="flex gap-2">
              <input
                value={question}
                onChange={e => setQuestion(e.target.value)}
                onKeyDown={e => { if (e.key === 'Enter') ask(); }}
                placeholder={t('askAboutPhoto')}
                className="flex-1 px-4 py-2 border border-gray-200 rounded-lg focus:ring-2 focus:ring-green-500"
              />
              <button
                onClick={ask}
                disabled={!question.trim() || diagnosis.state.status === 'pending'}
                className="px-4 py-2 bg-gray-800 text-white rounded-lg hover:bg-gray-900 disabled:opacity-50 flex items-center gap-2"
              >
                {diagnosis.state.status === 'pending'
                  ? <Loader2 className="w-4 h-4 animate-spin" />
                  : <Send className="w-4 h-4" />}
                {t('ask')}
              </button>
            </div>
            {diagnosis.state.status === 'success' && (
              <p className="p-4 bg-white border border-gray-200 rounded-xl whitespace-pre-wrap text-gray-700">
                {diagnosis.state.data.response}
              </p>
            )}
            {diagnosis.state.status === 'error' && (
              <p className="text-sm text-red-600">{t('connectionError')}</p>
            )}
          </div>
        )}

        {analysis.state.status === 'error' && (
          <div className="p-4 bg-red-50 border border-red-200 rounded-xl flex items-start gap-3">
            <AlertCircle className="w-5 h-5 text-red-600 mt-0.5" />
            <div className="flex-1">
              <p className="font-medium text-red-800">{t('error')}</p>
              <p className="text-red-600 text-sm mt-1">{t('failedAnalysis')}</p>
            </div>
            <button onClick={analyze} className="text-sm text-red-700 underline">
              {t('tryAgain')}
            </button>
          </div>
        )}

        {result && (
          <>
            <AnalysisResult result={result} t={t} />
            <button
              onClick={reset}
              className="w-full py-3 border border-gray-300 rounded-xl hover:bg-gray-50 transition-colors"
            >
              {t('resetScan')}
            </button>
          </>
        )}
      </div>
    </div>
  );
};

export default PlantScanner;
