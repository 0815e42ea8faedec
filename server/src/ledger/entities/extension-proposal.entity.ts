import { CreateDateColumn, Entity, PrimaryColumn } from "typeorm";

@Entity("extension_proposals")
export class ExtensionProposalEntity {
	@PrimaryColumn({ type: "text" })
	hash!: string;

	@CreateDateColumn()
	madeAt!: Date;
}
