import { Entity, PrimaryGeneratedColumn, Column, Index, ManyToOne, JoinColumn } from "typeorm";
import { Meta, Pronunciation, SyntacticBehaviour, Tag } from "../types";
import { LexiconRow } from "./LexiconRow";

@Entity("entries")
@Index(["lexiconRowId", "id"], { unique: true })
export class EntryRow {
  @PrimaryGeneratedColumn({ name: "row_id" })
  rowId!: number;

  @Column({ type: "varchar" })
  id!: string;

  @Column({ type: "integer", name: "lexicon_row_id" })
  lexiconRowId!: number;

  @ManyToOne(() => LexiconRow, { onDelete: "CASCADE" })
  @JoinColumn({ name: "lexicon_row_id" })
  lexicon!: LexiconRow;

  @Column({ type: "varchar" })
  lemma!: string;

  @Column({ type: "varchar" })
  pos!: string;

  @Column({ type: "varchar", nullable: true })
  script!: string | null;

  @Column("simple-json", { name: "lemma_pronunciations", nullable: true })
  pronunciations!: Pronunciation[] | null;

  @Column("simple-json", { name: "lemma_tags", nullable: true })
  tags!: Tag[] | null;

  @Column("simple-json", { name: "syntactic_behaviours", nullable: true })
  syntacticBehaviours!: SyntacticBehaviour[] | null;

  @Column("simple-json", { nullable: true })
  metadata!: Meta | null;
}
