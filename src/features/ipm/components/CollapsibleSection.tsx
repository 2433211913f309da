// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import React from 'react';
import { ChevronDown, ChevronUp } from 'lucide-react';

interface CollapsibleSectionProps {
  title: string;
  icon: React.ReactNode;
  expanded: boolean;
  onToggle: () => void;
  children: React.ReactNode;
}

const CollapsibleSection: React.FC<CollapsibleSectionProps> = ({ title, icon, expanded, onToggle, children }) => (
  <div className="bg-white rounded-2xl border border-gray-200 shadow-sm overflow-hidden">
    <button
      onClick={onToggle}
      aria-expanded={expanded}
      className="w-full p-4 flex items-center justify-between hover:bg-gray-50 transition-colors"
    >
      <div className="flex items-center gap-3">
        {icon}
        <span className="font-semibold text-gray-800">{title}</span>
      </div>
      {expanded ? <ChevronUp className="w-5 h-5 text-gray-500" /> : <ChevronDown className="w-5 h-5 text-gray-500" />}
    </button>
    {expanded && <div className="px-4 pb-4">{children}</div>}
  </div>
);

export default CollapsibleSection;
